import type { Logger } from 'pino';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export interface WithLoggerOptions<TResult> {
  logger: Logger;
  action: string;
  context?: Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult> | TResult;
}

export async function withLogger<TResult>({
  logger,
  action,
  context,
  summary,
  run,
}: WithLoggerOptions<TResult>): Promise<TResult> {
  const startedAt = Date.now();
  const common = {
    action,
    ...context,
  };

  logger.info(
    {
      event: 'action_started',
      ...common,
    },
    'Action started',
  );

  try {
    const result = await run();
    logger.info(
      {
        event: 'action_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Action completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'action_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Action failed',
    );
    throw error;
  }
}

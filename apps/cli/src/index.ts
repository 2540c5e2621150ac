import { AreaResolver, HhClient, HhVacancySearch } from '@vacancy-scout/parser-hh';
import { VacancyRepository, VacancyStoreCorruptedError } from '@vacancy-scout/storage';
import { loadEnvFiles, readCliConfig } from './config.js';
import { createConsoleIO } from './console-io.js';
import { runMenu } from './menu.js';
import { createCoreLogger } from './observability/core-logger.js';
import { createCliLogger } from './observability/logger.js';
import { serializeError } from './observability/with-logger.js';

async function run(): Promise<void> {
  loadEnvFiles();
  const config = readCliConfig(process.env);
  const logger = createCliLogger(config.log);
  const coreLogger = createCoreLogger(logger);

  let repository: VacancyRepository;
  try {
    repository = new VacancyRepository({ filePath: config.vacanciesFile, logger: coreLogger });
  } catch (error) {
    if (error instanceof VacancyStoreCorruptedError) {
      logger.error({ event: 'store_corrupted', filePath: error.filePath, error: serializeError(error) }, error.message);
      console.error(`Cannot open the vacancy store: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const client = new HhClient({ ...config.hh, logger: coreLogger });
  const search = new HhVacancySearch({ fetcher: client, logger: coreLogger });
  const areas = new AreaResolver({ fetcher: client, cachePath: config.areasCacheFile, logger: coreLogger });
  const io = createConsoleIO();

  logger.info(
    {
      event: 'cli_started',
      vacanciesFile: config.vacanciesFile,
      stored: repository.size,
    },
    'CLI started',
  );

  try {
    await runMenu({
      io,
      search,
      areas,
      repository,
      logger,
      defaultPageSize: config.defaultPageSize,
    });
  } finally {
    io.close();
  }
}

run().catch((error: unknown) => {
  console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});

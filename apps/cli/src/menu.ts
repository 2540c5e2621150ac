import type { AreaResolver, VacancySearch } from '@vacancy-scout/parser-hh';
import { isAffirmative, type VacancyRepository } from '@vacancy-scout/storage';
import { VacancyRecord } from '@vacancy-scout/vacancy-sdk';
import type { Logger } from 'pino';
import { withLogger } from './observability/with-logger.js';
import { renderVacancies } from './render.js';

export interface MenuIO {
  /** Resolves to `null` once input is closed. */
  ask(prompt: string): Promise<string | null>;
  print(line: string): void;
}

export interface MenuDeps {
  io: MenuIO;
  search: VacancySearch;
  areas: Pick<AreaResolver, 'resolveAreaId'>;
  repository: VacancyRepository;
  logger: Logger;
  defaultPageSize: number;
}

type ActionSummary = Record<string, unknown>;

interface MenuAction {
  name: string;
  label: string;
  run: (deps: MenuDeps) => Promise<ActionSummary>;
}

class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

async function prompt(io: MenuIO, question: string): Promise<string> {
  const answer = await io.ask(question);
  if (answer === null) {
    throw new InputClosedError();
  }

  return answer.trim();
}

/** Whole positive or negative integers only; `undefined` for anything else. */
function parseInteger(raw: string): number | undefined {
  return /^[+-]?\d+$/.test(raw) ? Number(raw) : undefined;
}

function parseAmount(raw: string, fallback: number): number | undefined {
  if (!raw) return fallback;

  const parsed = Number(raw.replace(',', '.'));
  return Number.isNaN(parsed) ? undefined : parsed;
}

function printList(io: MenuIO, heading: string, vacancies: readonly VacancyRecord[]): void {
  io.print(heading);
  if (vacancies.length > 0) {
    io.print(renderVacancies(vacancies));
  }
}

const searchAction: MenuAction = {
  name: 'search',
  label: 'Search vacancies on hh.ru',
  run: async ({ io, search, areas, repository, defaultPageSize }) => {
    const query = await prompt(io, 'Search query: ');
    if (!query) {
      io.print('Query cannot be empty!');
      return { skipped: 'empty_query' };
    }

    const excludedText = await prompt(io, 'Words to exclude (comma-separated): ');

    const rawCount = await prompt(io, `How many vacancies to load (default ${defaultPageSize}): `);
    const count = rawCount ? parseInteger(rawCount) : defaultPageSize;
    if (count === undefined) {
      io.print('Invalid number!');
      return { skipped: 'invalid_count' };
    }
    if (count <= 0) {
      io.print('Count must be positive!');
      return { skipped: 'invalid_count' };
    }

    const place = await prompt(io, 'Location (blank for anywhere): ');
    const areaId = await areas.resolveAreaId(place);

    io.print(`Searching vacancies for '${query}'...`);
    const vacancies = await search.search(query, excludedText, areaId, count);
    if (vacancies.length === 0) {
      io.print('No vacancies found.');
      return { areaId, found: 0, saved: 0 };
    }

    const saved = repository.addMany(vacancies);
    io.print(`Found ${vacancies.length} vacancies. Saved ${saved} new ones.`);
    return { areaId, found: vacancies.length, saved };
  },
};

const topAction: MenuAction = {
  name: 'top_by_salary',
  label: 'Show top N vacancies by salary',
  run: async ({ io, repository }) => {
    const n = parseInteger(await prompt(io, 'How many vacancies to show: '));
    if (n === undefined) {
      io.print('Invalid number!');
      return { skipped: 'invalid_count' };
    }
    if (n <= 0) {
      io.print('Number must be positive!');
      return { skipped: 'invalid_count' };
    }

    const top = repository.topBySalary(n);
    if (top.length === 0) {
      io.print('No saved vacancies.');
    } else {
      printList(io, `Top ${n} vacancies by salary:`, top);
    }

    return { n, shown: top.length };
  },
};

const keywordAction: MenuAction = {
  name: 'filter_by_keyword',
  label: 'Search saved vacancies by keyword',
  run: async ({ io, repository }) => {
    const keyword = await prompt(io, 'Keyword: ');
    if (!keyword) {
      io.print('Keyword cannot be empty!');
      return { skipped: 'empty_keyword' };
    }

    const results = repository.filterByKeyword(keyword);
    if (results.length === 0) {
      io.print('No vacancies match this keyword.');
    } else {
      printList(io, `Found ${results.length} vacancies with keyword '${keyword}':`, results);
    }

    return { matched: results.length };
  },
};

const listAction: MenuAction = {
  name: 'list_all',
  label: 'Show all saved vacancies',
  run: async ({ io, repository }) => {
    const all = repository.all();
    if (all.length === 0) {
      io.print('No saved vacancies.');
    } else {
      printList(io, `Saved vacancies: ${all.length}`, all);
    }

    return { total: all.length };
  },
};

const deleteAction: MenuAction = {
  name: 'delete_by_url',
  label: 'Delete a vacancy by URL',
  run: async ({ io, repository }) => {
    const url = await prompt(io, 'URL of the vacancy to delete: ');
    if (!url) {
      io.print('URL cannot be empty!');
      return { skipped: 'empty_url' };
    }

    const deleted = repository.delete(VacancyRecord.deletionKey(url));
    io.print(deleted ? 'Vacancy deleted.' : 'Vacancy not found.');
    return { deleted };
  },
};

const salaryRangeAction: MenuAction = {
  name: 'filter_by_salary_range',
  label: 'Search saved vacancies by salary range',
  run: async ({ io, repository }) => {
    const min = parseAmount(await prompt(io, 'Minimum salary: '), 0);
    const max = parseAmount(await prompt(io, 'Maximum salary: '), Number.POSITIVE_INFINITY);
    if (min === undefined || max === undefined) {
      io.print('Invalid salary format!');
      return { skipped: 'invalid_salary' };
    }

    const results = repository.filterBySalaryRange(min, max);
    printList(io, `Found ${results.length} vacancies between ${min} and ${max}`, results);
    return { min, max, matched: results.length };
  },
};

const employerAction: MenuAction = {
  name: 'filter_by_employer',
  label: 'Search saved vacancies by employer',
  run: async ({ io, repository }) => {
    const employer = await prompt(io, 'Employer name: ');
    if (!employer) {
      io.print('Employer name cannot be empty!');
      return { skipped: 'empty_employer' };
    }

    const results = repository.filterByEmployer(employer);
    if (results.length === 0) {
      io.print(`No vacancies from ${employer}.`);
    } else {
      printList(io, `Found ${results.length} vacancies from ${employer}:`, results);
    }

    return { matched: results.length };
  },
};

const clearAction: MenuAction = {
  name: 'delete_all',
  label: 'Delete all vacancies',
  run: async ({ io, repository }) => {
    const answer = await prompt(io, 'Delete all vacancies? (yes/no): ');
    if (!isAffirmative(answer)) {
      io.print('Deletion cancelled.');
      return { cleared: false };
    }

    repository.deleteAll();
    io.print('All vacancies deleted.');
    return { cleared: true };
  },
};

export const MENU_ACTIONS: ReadonlyMap<string, MenuAction> = new Map([
  ['1', searchAction],
  ['2', topAction],
  ['3', keywordAction],
  ['4', listAction],
  ['5', deleteAction],
  ['6', salaryRangeAction],
  ['7', employerAction],
  ['8', clearAction],
]);

const EXIT_CHOICE = '9';

function printMenu(io: MenuIO): void {
  io.print('');
  io.print('Choose an action:');
  for (const [choice, action] of MENU_ACTIONS) {
    io.print(`${choice}. ${action.label}`);
  }
  io.print(`${EXIT_CHOICE}. Exit`);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Interactive loop. Returns when the user exits or input closes; a failing
 * action is reported and the loop goes on.
 */
export async function runMenu(deps: MenuDeps): Promise<void> {
  const { io, logger } = deps;

  io.print('Welcome to the vacancy search!');
  io.print('='.repeat(50));
  logger.info({ event: 'session_started' }, 'Session started');

  for (;;) {
    printMenu(io);

    let choice: string;
    try {
      choice = await prompt(io, `\nEnter action number (1-${EXIT_CHOICE}): `);
    } catch (error) {
      if (error instanceof InputClosedError) break;
      throw error;
    }

    if (choice === EXIT_CHOICE) {
      io.print('Goodbye!');
      break;
    }

    const action = MENU_ACTIONS.get(choice);
    if (!action) {
      io.print(`Invalid choice. Please enter a number from 1 to ${EXIT_CHOICE}.`);
      continue;
    }

    try {
      await withLogger({
        logger,
        action: action.name,
        summary: (result) => result,
        run: () => action.run(deps),
      });
    } catch (error) {
      if (error instanceof InputClosedError) break;
      io.print(`Error: ${describeError(error)}`);
    }
  }

  logger.info({ event: 'session_finished' }, 'Session finished');
}

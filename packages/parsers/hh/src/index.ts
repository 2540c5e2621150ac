export {
  HhClient,
  HhHttpError,
  HhInvalidBodyError,
  buildRequestPath,
  classifyFailure,
  classifyStatus,
} from './client.js';
export type { HhClientOptions, HhFailureReason } from './client.js';
export { hhSearchItemSchema, mapSearchItemToVacancy, mapSearchItems } from './mapper.js';
export type { MapSearchItemsOptions } from './mapper.js';
export { HhVacancySearch, HH_MAX_PER_PAGE, HH_MAX_RESULTS_DEPTH, isExcluded, parseExcludedWords } from './search.js';
export type { HhVacancySearchOptions, VacancySearch } from './search.js';
export { AreaResolver, UNRESOLVED_AREA_ID, findAreaId, parseAreaTree } from './areas.js';
export type { AreaBranch, AreaLeaf, AreaNode, AreaResolverOptions } from './areas.js';
export type {
  HhEmployer,
  HhSalary,
  HhSearchPage,
  HhSearchVacancyItem,
  HhSnippet,
  PageFetcher,
  QueryParams,
} from './types.js';

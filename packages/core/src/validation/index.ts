export {
  identifierSchema,
  filterOperatorSchema,
  filterConditionSchema,
  orderBySchema,
  queryOptionsSchema,
  primaryKeyTypeSchema,
} from './schemas.js';
export type { FilterOperatorInput, FilterConditionInput, QueryOptionsInput } from './schemas.js';

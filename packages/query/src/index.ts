export { Database } from './database';
export { QueryExecutor } from './executor';
export { QueryPlan, isPlanSnapshot } from './plan';
export { range } from '@recset/scopes';

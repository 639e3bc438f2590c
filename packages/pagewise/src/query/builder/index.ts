/**
 * Query Builder Module
 */
export { createQueryBuilder, QueryBuilder } from "./query-builder";

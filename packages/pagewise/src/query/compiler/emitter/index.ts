export {
  emitSelectStatementSql,
  type SelectStatementEmitterInput,
} from "./standard";
export {
  buildFromClause,
  buildGroupBy,
  buildHaving,
  buildOrderBy,
  buildProjection,
  buildWhere,
} from "./standard-builders";

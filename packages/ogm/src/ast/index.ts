/**
 * Clause Model Module
 */

export type {
  Operator,
  OrderDirection,
  WhereKeyword,
  Direction,
  Operand,
  ProjectionEntry,
  OrderEntry,
  Hops,
  MatchClause,
  MergeClause,
  CreateClause,
  CallClause,
  NodeClause,
  RelationshipClause,
  WhereClause,
  UnwindClause,
  WithClause,
  ReturnClause,
  YieldClause,
  UnionClause,
  DeleteClause,
  RemoveClause,
  OrderByClause,
  LimitClause,
  SkipClause,
  ForeachClause,
  SetClause,
  LoadCsvClause,
  RawClause,
  Clause,
  ClauseType,
  ProjectionClause,
  ModifierClause,
} from './types'

export {
  OPERATORS,
  ORDER_DIRECTIONS,
  isOperator,
  isOrderDirection,
  isProjectionClause,
  isModifierClause,
  isPatternClause,
} from './types'

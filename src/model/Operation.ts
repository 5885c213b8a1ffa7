// src/model/Operation.ts

export type ConversionType = 'int' | 'float' | 'string' | 'datetime';
export type AggregationType = 'sum' | 'mean' | 'count' | 'min' | 'max';
export type FilterOperator =
  | 'contains'
  | 'eq'
  | 'ne'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'isNull'
  | 'isNotNull';

export const CONVERSION_TYPES: readonly ConversionType[] = ['int', 'float', 'string', 'datetime'];
export const AGGREGATION_TYPES: readonly AggregationType[] = ['sum', 'mean', 'count', 'min', 'max'];
export const FILTER_OPERATORS: readonly FilterOperator[] = [
  'contains', 'eq', 'ne', 'gt', 'gte', 'lt', 'lte', 'isNull', 'isNotNull',
];

export type Operation =
  | { type: 'dropDuplicates' }
  | { type: 'convertType'; column: string; to: ConversionType }
  | { type: 'sort'; column: string; ascending: boolean }
  | { type: 'groupBy'; column: string; agg: AggregationType; outputSheet?: string }
  | { type: 'setIndex'; column: string }
  | { type: 'resetIndex' }
  | { type: 'dropMissing' }
  | { type: 'fillMissing'; value: string; columns?: string[] }
  | { type: 'rename'; from: string; to: string }
  | { type: 'dropColumns'; columns: string[] }
  | { type: 'restoreColumns'; columns: string[] }
  | { type: 'dropRows'; rows: (string | number)[] }
  | { type: 'restoreRows'; rows: (string | number)[] }
  | { type: 'filter'; column: string; value: string; operator: FilterOperator }
  | { type: 'formula'; formula: string }
  | { type: 'preview'; rows?: number };

export type OperationType = Operation['type'];

export const OPERATION_TYPES: readonly OperationType[] = [
  'dropDuplicates', 'convertType', 'sort', 'groupBy', 'setIndex', 'resetIndex',
  'dropMissing', 'fillMissing', 'rename', 'dropColumns', 'restoreColumns',
  'dropRows', 'restoreRows', 'filter', 'formula', 'preview',
];

/**
 * Queries stored with a model, kept for round trips through the tool
 * chain. The formula text is not interpreted here.
 */

import { type ModelOption } from './options.js';

export enum ExpectationType {
  Symbolic = 'symbolic',
  Probability = 'probability',
  NumericValue = 'numeric',
  ErrorValue = 'error',
}

export enum QueryStatus {
  True = 'true',
  False = 'false',
  MaybeTrue = 'maybe_true',
  MaybeFalse = 'maybe_false',
  Unknown = 'unknown',
}

export enum ResourceType {
  Time = 'time',
  Memory = 'memory',
}

export interface Resource {
  name: string;
  value: string;
  unit?: string;
}

export interface Expectation {
  valueType: ExpectationType;
  status: QueryStatus;
  value: string;
  resources: Resource[];
}

export interface Query {
  formula: string;
  comment: string;
  options: ModelOption[];
  expectation: Expectation;
  location: string;
}

export function query(formula: string, fields: Partial<Omit<Query, 'formula'>> = {}): Query {
  return {
    formula,
    comment: fields.comment ?? '',
    options: fields.options ?? [],
    expectation: fields.expectation ?? {
      valueType: ExpectationType.Symbolic,
      status: QueryStatus.Unknown,
      value: '',
      resources: [],
    },
    location: fields.location ?? '',
  };
}

export function cloneQuery(q: Query): Query {
  return {
    ...q,
    options: q.options.map(o => ({ ...o })),
    expectation: { ...q.expectation, resources: q.expectation.resources.map(r => ({ ...r })) },
  };
}

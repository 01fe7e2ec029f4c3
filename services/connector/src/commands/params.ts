import type { ConnectorRequest, RequestValue } from '../types';
import { ARRAY_PARAMS, DIRS_ALIAS_PARAM, SCALAR_PARAMS, type ConnectorParams } from './types';

type ParameterSource = Record<string, RequestValue | undefined>;

function firstValue(value: RequestValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function selectParameterSource(request: ConnectorRequest): ParameterSource {
  switch (request.method.toUpperCase()) {
    case 'POST':
      return request.body;
    case 'GET':
      return request.query;
    default:
      return {};
  }
}

/**
 * Copies allow-listed parameters only. Array parameters keep their order; anything else is
 * dropped without complaint.
 */
export function extractParams(source: ParameterSource): ConnectorParams {
  const params: ConnectorParams = {};

  for (const name of SCALAR_PARAMS) {
    const value = source[name];
    if (value === undefined) {
      continue;
    }
    const scalar = firstValue(value);
    if (scalar !== undefined) {
      params[name] = scalar;
    }
  }

  for (const name of ARRAY_PARAMS) {
    const value = source[name];
    if (value === undefined) {
      continue;
    }
    params[name] = Array.isArray(value) ? [...value] : [value];
  }

  const dirs = source[DIRS_ALIAS_PARAM];
  if (dirs !== undefined) {
    const first = firstValue(dirs);
    if (first !== undefined) {
      params.name = first;
    }
  }

  return params;
}

import type { ConnectorParams, ContractParams, ParameterContract } from './types';

export function validateParams<const C extends ParameterContract>(
  params: ConnectorParams,
  contract: C
): params is ContractParams<C> {
  for (const [field, required] of Object.entries(contract)) {
    const present = Object.prototype.hasOwnProperty.call(params, field);
    if (required === true && !present) {
      return false;
    }
    if (required === false && present) {
      return false;
    }
  }
  return true;
}

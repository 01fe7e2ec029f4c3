import { archiveCommand, extractCommand } from './archives';
import { mkdirCommand, mkfileCommand, pasteCommand, removeCommand, renameCommand, uploadCommand } from './mutations';
import { fileCommand, listCommand, openCommand, parentsCommand, treeCommand } from './navigation';
import type { CommandDescriptor, CommandHandler, ContractParams, ParameterContract } from './types';
import { validateParams } from './validator';

/**
 * Pairs a handler with its parameter contract. The handler's parameter type is derived from the
 * contract, so a handler reading a parameter the contract does not require fails to compile.
 */
export function defineCommand<const C extends ParameterContract>(
  contract: C,
  handler: CommandHandler<ContractParams<C>>
): CommandDescriptor {
  return {
    contract,
    prepare(params) {
      if (!validateParams(params, contract)) {
        return null;
      }
      const validated = params;
      return (environment) => handler({ ...environment, params: validated });
    }
  };
}

export const COMMAND_REGISTRY = {
  open: defineCommand({ target: true }, openCommand),
  tree: defineCommand({ target: true }, treeCommand),
  file: defineCommand({ target: true }, fileCommand),
  parents: defineCommand({ target: true }, parentsCommand),
  mkdir: defineCommand({ target: true, name: true }, mkdirCommand),
  mkfile: defineCommand({ target: true, name: true }, mkfileCommand),
  rename: defineCommand({ target: true, name: true }, renameCommand),
  ls: defineCommand({ target: true }, listCommand),
  paste: defineCommand({ 'targets[]': true, src: true, dst: true, cut: true }, pasteCommand),
  rm: defineCommand({ 'targets[]': true }, removeCommand),
  upload: defineCommand({ target: true }, uploadCommand),
  extract: defineCommand({ target: true }, extractCommand),
  archive: defineCommand({ target: true, 'targets[]': true, name: true, type: true }, archiveCommand)
} as const satisfies Record<string, CommandDescriptor>;

export type CommandName = keyof typeof COMMAND_REGISTRY;

export const COMMAND_NAMES: CommandName[] = Object.keys(COMMAND_REGISTRY).filter(isCommandName);

export function isCommandName(value: string): value is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMAND_REGISTRY, value);
}

/**
 * Command table definition and outbound frame encoding.
 */

import type { CommandDescriptor, Framing } from '../models/command';
import { validateArgument } from './validation';

/**
 * Freeze a command table and every descriptor in it.
 *
 * Tables are defined once at module load and shared by every device
 * instance, so dispatch can never mutate them.
 *
 * @example
 * ```typescript
 * const Commands = defineCommands({
 *   SET_TEMP: {
 *     name: 'OUT_SP_1',
 *     argumentType: 'integer',
 *     bounds: { min: 20, max: 300 },
 *   },
 *   GET_TEMP: { name: 'IN_PV_1', reply: { type: 'real', slice: { start: 8 } } },
 * } as const);
 * ```
 */
export function defineCommands<T extends Record<string, CommandDescriptor>>(
  commands: T
): Readonly<T> {
  for (const command of Object.values(commands)) {
    if (command.bounds) {
      Object.freeze(command.bounds);
    }
    if (command.reply) {
      if (command.reply.slice) {
        Object.freeze(command.reply.slice);
      }
      Object.freeze(command.reply);
    }
    Object.freeze(command);
  }
  return Object.freeze(commands);
}

/**
 * Build the outbound frame for a command.
 *
 * @param command - Command descriptor
 * @param framing - Protocol framing strings
 * @param argument - Optional argument, validated against the descriptor
 * @returns Frame text: name, optional delimiter and argument, terminator
 * @throws {InvalidArgumentError} If the argument fails validation
 *
 * @example
 * ```typescript
 * encodeCommand({ name: 'OUT_SP_1', argumentType: 'integer' }, DEFAULT_FRAMING, 150);
 * // => 'OUT_SP_1 150\r\n'
 * ```
 */
export function encodeCommand(
  command: CommandDescriptor,
  framing: Framing,
  argument?: number
): string {
  validateArgument(command, argument);

  const body =
    argument === undefined
      ? command.name
      : `${command.name}${framing.argumentDelimiter}${argument}`;

  return `${body}${framing.commandTerminator}`;
}

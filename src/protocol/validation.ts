/**
 * Argument validation against command descriptors.
 */

import { InvalidArgumentError } from '../exceptions';
import type { CommandDescriptor } from '../models/command';

/**
 * Check a call-site argument against a descriptor's type and bounds.
 *
 * @param command - Descriptor of the command about to be sent
 * @param argument - Candidate argument (undefined when none was supplied)
 * @throws {InvalidArgumentError} If the command takes no argument, or the
 *   argument has the wrong type or lies outside the inclusive bounds
 */
export function validateArgument(
  command: CommandDescriptor,
  argument: unknown
): void {
  if (argument === undefined) {
    return;
  }

  if (!command.argumentType) {
    throw new InvalidArgumentError(
      `Command ${command.name} takes no argument, got ${String(argument)}`
    );
  }

  if (typeof argument !== 'number' || !Number.isFinite(argument)) {
    throw new InvalidArgumentError(
      `Command ${command.name} expects a ${command.argumentType} argument, got ${String(argument)}`
    );
  }

  if (command.argumentType === 'integer' && !Number.isInteger(argument)) {
    throw new InvalidArgumentError(
      `Command ${command.name} expects an integer argument, got ${argument}`
    );
  }

  const { bounds } = command;
  if (bounds && (argument < bounds.min || argument > bounds.max)) {
    throw new InvalidArgumentError(
      `Argument ${argument} for ${command.name} outside range [${bounds.min}, ${bounds.max}]`
    );
  }
}

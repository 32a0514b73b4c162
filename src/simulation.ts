/**
 * Simulation mode substitution.
 */

import type { Logger } from './logger';

/**
 * Anything that can run in simulation mode.
 */
export interface SimulationAware {
  readonly deviceName: string;
  readonly simulation: boolean;
  readonly logger: Logger;
}

/**
 * Wrap a device operation so that in simulation mode it resolves to `value`
 * without running.
 *
 * The simulation flag is read on every call, not when wrapping.
 *
 * @param device - Device the operation belongs to
 * @param value - Substitute result in simulation mode
 * @param operation - Real operation, run when not simulating
 *
 * @example
 * ```typescript
 * readonly isConnected = inSimulationDeviceReturns(this, 'Hotplate', async () => {
 *   return (await this.send(Commands.STATUS)) >= 0;
 * });
 * ```
 */
export function inSimulationDeviceReturns<A extends unknown[], R, S>(
  device: SimulationAware,
  value: S,
  operation: (...args: A) => Promise<R>
): (...args: A) => Promise<R | S> {
  return async (...args: A): Promise<R | S> => {
    if (device.simulation) {
      device.logger.debug(`Simulation mode, returning ${String(value)}`);
      return value;
    }
    return operation(...args);
  };
}

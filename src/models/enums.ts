/**
 * Lookup tables and selectors for hotplate devices.
 */

/**
 * Temperature sensor selector.
 */
export enum Sensor {
  HOTPLATE = 0,
  PROBE = 1,
}

/**
 * Remote status codes reported by the STATUS query.
 */
export const STATUS: Readonly<Record<number, string>> = Object.freeze({
  [-1]: 'REMOTE BLOCKED',
  0: 'MANUAL',
  1: 'REMOTE START',
  2: 'REMOTE STOP',
});

/**
 * Reported by getStatus() for any code outside the status table.
 */
export const STATUS_ERROR = 'ERROR';

/**
 * Temperature regulation modes.
 */
export const TEMP_MODE: Readonly<Record<number, string>> = Object.freeze({
  0: 'PRECISE',
  1: 'FAST',
});

/**
 * Whether heating and stirring resume after a power failure.
 */
export const RESET_MODE: Readonly<Record<number, string>> = Object.freeze({
  0: 'ALL OFF',
  1: 'ALL ON',
});

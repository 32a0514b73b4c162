/**
 * Protocol layer exports for line-oriented lab device communication.
 */

export * from './constants';
export * from './commands';
export * from './validation';
export * from './responses';

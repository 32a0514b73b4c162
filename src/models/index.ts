/**
 * Models layer exports for lab device structures.
 */

export * from './command';
export * from './connection';
export * from './enums';
export * from './capabilities';

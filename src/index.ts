/**
 * carousel-connect - TypeScript driver for the Radleys Carousel Connect hotplate/stirrer
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { LabDevice, type LabDeviceOptions } from './device';
export { CarouselConnect, decodeStatus } from './devices/carousel-connect';
export { CarouselCommands } from './devices/carousel-commands';
export { inSimulationDeviceReturns, type SimulationAware } from './simulation';
export { createLogger, type Logger } from './logger';

// Protocol
export * from './protocol';

// Transport
export { createConnection, type Connection } from './transport/connection';
export {
  SerialConnection,
  type SerialConnectionOptions,
  type SerialPortFactory,
  type SerialPortLike,
} from './transport/serial-connection';
export { TcpConnection, type TcpConnectionOptions } from './transport/tcp-connection';
export {
  SimulatedConnection,
  type SimulatedConnectionOptions,
  type SimulatedReplyHandler,
} from './transport/simulated-connection';
export { ChunkDecoder, ReplyBuffer } from './transport/reply-buffer';

// Models and types
export * from './models';

// Exceptions
export * from './exceptions';

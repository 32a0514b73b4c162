/**
 * Exception classes for lab device drivers.
 */

export class LabDeviceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LabDeviceError';
  }
}

export class ConnectionError extends LabDeviceError {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
  }
}

export class ConnectionTimeoutError extends ConnectionError {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionTimeoutError';
  }
}

export class DeviceCommandError extends LabDeviceError {
  constructor(message: string) {
    super(message);
    this.name = 'DeviceCommandError';
  }
}

export class InvalidArgumentError extends DeviceCommandError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class ProtocolError extends LabDeviceError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class MalformedReplyError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedReplyError';
  }
}

export class UnsupportedOperationError extends LabDeviceError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}

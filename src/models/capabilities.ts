/**
 * Device capability interfaces.
 */

/**
 * Lifecycle shared by every lab device.
 */
export interface LabDeviceCapabilities {
  /** Open the connection and run the device handshake */
  initialize(): Promise<void>;

  /** Close the connection */
  disconnect(): Promise<void>;

  /**
   * Liveness probe. Never rejects on connection failures.
   * Simulated devices resolve to their name.
   */
  isConnected(): Promise<boolean | string>;

  /** Whether the device is ready to accept a new operation */
  isIdle(): Promise<boolean>;

  getStatus(): Promise<string>;

  /** Inspect the device error register, where the device has one */
  checkErrors(): Promise<void>;

  /** Clear the device error register, where the device has one */
  clearErrors(): Promise<void>;
}

/**
 * Combined hotplate/stirrer.
 *
 * Operations an instrument does not implement are explicit no-ops or raise
 * UnsupportedOperationError, never silently missing.
 */
export interface Hotplate extends LabDeviceCapabilities {
  startTemperatureRegulation(): Promise<void>;
  stopTemperatureRegulation(): Promise<void>;

  startStirring(): Promise<void>;
  stopStirring(): Promise<void>;

  /** Set the stirring speed in rpm */
  setSpeed(speed: number): Promise<void>;
  getSpeed(): Promise<number>;
  getSpeedSetpoint(): Promise<number>;

  /** Set the target temperature in °C for the given sensor */
  setTemperature(temperature: number, sensor?: number): Promise<void>;
  getTemperature(sensor?: number): Promise<number>;
  getTemperatureSetpoint(sensor?: number): Promise<number>;
  getTemperatureSafetyDelta(): Promise<number>;

  getSensorType(): Promise<string>;

  setResetMode(mode?: number): Promise<void>;
  getResetMode(): Promise<string>;

  setHeatMode(mode?: number): Promise<void>;
  getHeatMode(): Promise<string>;

  reset(): Promise<void>;

  setConnectionCheckOn(): Promise<void>;
  setConnectionCheckOff(): Promise<void>;
}

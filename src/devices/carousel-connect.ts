/**
 * Radleys Carousel Connect hotplate/stirrer.
 */

import { LabDevice, type LabDeviceOptions } from '../device';
import {
  ConnectionError,
  InvalidArgumentError,
  MalformedReplyError,
} from '../exceptions';
import type { Hotplate } from '../models/capabilities';
import {
  RESET_MODE,
  STATUS,
  STATUS_ERROR,
  Sensor,
  TEMP_MODE,
} from '../models/enums';
import { inSimulationDeviceReturns } from '../simulation';
import { CarouselCommands } from './carousel-commands';

/**
 * Map a STATUS code to its label. Codes outside (-2, 3) are reported as
 * "ERROR" so status polling never throws on odd firmware replies.
 */
export function decodeStatus(code: number): string {
  if (3 > code && code > -2) {
    return STATUS[code] ?? STATUS_ERROR;
  }
  return STATUS_ERROR;
}

function lookupMode(
  table: Readonly<Record<number, string>>,
  code: number,
  what: string
): string {
  const mode = table[code];
  if (mode === undefined) {
    throw new MalformedReplyError(`Unknown ${what} code ${code}`);
  }
  return mode;
}

function assertSensor(sensor: number): void {
  if (sensor !== Sensor.HOTPLATE && sensor !== Sensor.PROBE) {
    throw new InvalidArgumentError(
      `Invalid sensor ${sensor}. Use 0 for hotplate or 1 for external probe`
    );
  }
}

/**
 * Radleys Carousel Connect driven over its "new" remote protocol.
 *
 * Heating and stirring are independent: starting one does not affect the
 * other. Start commands return immediately; poll getTemperature() or
 * getSpeed() to follow progress.
 *
 * @example
 * ```typescript
 * const plate = new CarouselConnect({
 *   connectionParameters: { port: '/dev/ttyUSB0' },
 * });
 * await plate.initialize();
 * await plate.setTemperature(80);
 * await plate.startTemperatureRegulation();
 * console.log(await plate.getTemperature(Sensor.PROBE));
 * await plate.disconnect();
 * ```
 */
export class CarouselConnect extends LabDevice implements Hotplate {
  static readonly DEFAULT_NAME = 'Radleys Carousel Connect';

  constructor(options: LabDeviceOptions) {
    super(CarouselConnect.DEFAULT_NAME, options);
  }

  /**
   * Open the connection and switch the device to the new protocol.
   *
   * @throws {ConnectionError} If the device cannot be reached; the
   *   connection is left closed
   */
  readonly initialize = inSimulationDeviceReturns(
    this,
    undefined,
    async (): Promise<void> => {
      await this.openConnection();
      try {
        await this.send(CarouselCommands.PROTOCOL_NEW);
      } catch (error) {
        await this.closeConnection();
        throw error;
      }
      this.logger.info('Device initialized');
    }
  );

  readonly disconnect = inSimulationDeviceReturns(
    this,
    undefined,
    async (): Promise<void> => {
      await this.closeConnection();
    }
  );

  /**
   * Liveness probe based on the remote status.
   *
   * Resolves false when the connection fails, when the remote interface is
   * blocked (-1) or when the device reports an error code (below -1).
   * In simulation mode resolves to the device name.
   */
  readonly isConnected = inSimulationDeviceReturns(
    this,
    CarouselConnect.DEFAULT_NAME,
    async (): Promise<boolean> => {
      let status: number;
      try {
        status = await this.send(CarouselCommands.QUERY_STATUS);
      } catch (error) {
        if (error instanceof ConnectionError) {
          this.logger.warn(`Connection check failed: ${error.message}`);
          return false;
        }
        throw error;
      }

      if (status === -1) {
        this.logger.error('Device connection blocked');
        return false;
      }
      if (status < -1) {
        this.logger.error(`Device error (status ${status})`);
        return false;
      }
      return true;
    }
  );

  /**
   * True only in the "REMOTE START" state.
   */
  async isIdle(): Promise<boolean> {
    return (await this.getStatus()) === STATUS[1];
  }

  async getStatus(): Promise<string> {
    return decodeStatus(await this.send(CarouselCommands.QUERY_STATUS));
  }

  /**
   * Not supported by this instrument.
   */
  async checkErrors(): Promise<void> {}

  /**
   * Not supported by this instrument.
   */
  async clearErrors(): Promise<void> {}

  async startTemperatureRegulation(): Promise<void> {
    await this.send(CarouselCommands.START_HEAT);
    this.logger.info('Started heating');
  }

  async stopTemperatureRegulation(): Promise<void> {
    await this.send(CarouselCommands.STOP_HEAT);
    this.logger.info('Stopped heating');
  }

  async startStirring(): Promise<void> {
    await this.send(CarouselCommands.START_STIR);
    this.logger.info('Started stirring');
  }

  async stopStirring(): Promise<void> {
    await this.send(CarouselCommands.STOP_STIR);
    this.logger.info('Stopped stirring');
  }

  /**
   * @param speed - Stirring speed, 100-1400 rpm
   */
  async setSpeed(speed: number): Promise<void> {
    await this.send(CarouselCommands.SET_SPEED, speed);
  }

  async getSpeed(): Promise<number> {
    return this.send(CarouselCommands.GET_STIR_SPEED);
  }

  async getSpeedSetpoint(): Promise<number> {
    return this.send(CarouselCommands.GET_SET_MOTOR_SPEED);
  }

  /**
   * The device keeps a single setpoint and regulates on whichever sensor is
   * attached, so `sensor` is only checked for validity.
   *
   * @param temperature - Whole degrees, 20-300 °C
   */
  async setTemperature(
    temperature: number,
    sensor: number = Sensor.HOTPLATE
  ): Promise<void> {
    assertSensor(sensor);
    await this.send(CarouselCommands.SET_TEMP, temperature);
  }

  async getTemperatureSetpoint(sensor: number = Sensor.HOTPLATE): Promise<number> {
    assertSensor(sensor);
    return this.send(CarouselCommands.GET_SET_TEMP);
  }

  /**
   * Read the current temperature.
   *
   * @param sensor - 0 for the hotplate, 1 for the external probe
   * @throws {InvalidArgumentError} For any other sensor
   */
  async getTemperature(sensor: number = Sensor.HOTPLATE): Promise<number> {
    assertSensor(sensor);
    return sensor === Sensor.HOTPLATE
      ? this.send(CarouselCommands.GET_HOTPLATE_TEMP)
      : this.send(CarouselCommands.GET_PROBE_TEMP);
  }

  /**
   * Read the safety circuit temperature for a sensor.
   */
  async getSafetyTemperature(sensor: number = Sensor.HOTPLATE): Promise<number> {
    assertSensor(sensor);
    return sensor === Sensor.HOTPLATE
      ? this.send(CarouselCommands.GET_HOTPLATE_SAFETY_TEMP)
      : this.send(CarouselCommands.GET_PROBE_SAFETY_TEMP);
  }

  async getTemperatureSafetyDelta(): Promise<number> {
    return this.send(CarouselCommands.GET_SET_TEMP_SAFETY_DELTA);
  }

  async getSensorType(): Promise<string> {
    const type = await this.send(CarouselCommands.QUERY_TEMP_SENSOR_TYPE);
    return type === Sensor.HOTPLATE ? 'HOTPLATE (0)' : 'PROBE (1)';
  }

  /**
   * @param mode - 0: all off after power failure, 1: resume heating and stirring
   */
  async setResetMode(mode: number = 0): Promise<void> {
    await this.send(CarouselCommands.SET_RESET_MODE, mode);
  }

  async getResetMode(): Promise<string> {
    const code = await this.send(CarouselCommands.QUERY_RESET_MODE);
    return lookupMode(RESET_MODE, code, 'reset mode');
  }

  /**
   * @param mode - 0: precise, 1: fast
   */
  async setHeatMode(mode: number = 0): Promise<void> {
    await this.send(CarouselCommands.SET_TEMP_MODE, mode);
  }

  async getHeatMode(): Promise<string> {
    const code = await this.send(CarouselCommands.QUERY_TEMP_MODE);
    return lookupMode(TEMP_MODE, code, 'heat mode');
  }

  async reset(): Promise<void> {
    await this.send(CarouselCommands.RESET);
  }

  async setConnectionCheckOn(): Promise<void> {
    await this.send(CarouselCommands.CHECK_CONNECTION_ON);
  }

  async setConnectionCheckOff(): Promise<void> {
    await this.send(CarouselCommands.CHECK_CONNECTION_OFF);
  }

  async getSoftwareVersion(): Promise<string> {
    return this.send(CarouselCommands.SOFTWARE_VERSION);
  }
}

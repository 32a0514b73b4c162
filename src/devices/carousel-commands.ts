/**
 * Command table for the Radleys Carousel Connect hotplate/stirrer.
 *
 * Reply offsets skip the echoed command name: "IN_PV_3 25.4" holds the
 * reading from offset 8.
 */

import { defineCommands } from '../protocol/commands';

export const CarouselCommands = defineCommands({
  // Control
  SET_TEMP: {
    name: 'OUT_SP_1',
    argumentType: 'integer',
    bounds: { min: 20, max: 300 },
    reply: { type: 'real', slice: { start: 9 } },
  },
  SET_SPEED: {
    name: 'OUT_SP_3',
    argumentType: 'real',
    bounds: { min: 100, max: 1400 },
    reply: { type: 'string', slice: { start: 9 } },
  },
  SET_RESET_MODE: {
    name: 'OUT_MODE_2',
    argumentType: 'integer',
    bounds: { min: 0, max: 1 },
    reply: { type: 'string' },
  },
  SET_TEMP_MODE: {
    name: 'OUT_MODE_4',
    argumentType: 'integer',
    bounds: { min: 0, max: 1 },
    reply: { type: 'string' },
  },
  START_HEAT: { name: 'START_1', reply: { type: 'string' } },
  START_STIR: { name: 'START_2', reply: { type: 'string' } },
  STOP_HEAT: { name: 'STOP_1', reply: { type: 'string' } },
  STOP_STIR: { name: 'STOP_2', reply: { type: 'string' } },
  RESET: { name: 'RESET' },

  // Readings
  GET_PROBE_TEMP: { name: 'IN_PV_1', reply: { type: 'real', slice: { start: 8 } } },
  GET_PROBE_SAFETY_TEMP: { name: 'IN_PV_2', reply: { type: 'real', slice: { start: 8 } } },
  GET_HOTPLATE_TEMP: { name: 'IN_PV_3', reply: { type: 'real', slice: { start: 8 } } },
  GET_HOTPLATE_SAFETY_TEMP: { name: 'IN_PV_4', reply: { type: 'real', slice: { start: 8 } } },
  GET_STIR_SPEED: { name: 'IN_PV_5', reply: { type: 'real', slice: { start: 8 } } },
  GET_SET_TEMP: { name: 'IN_SP_1', reply: { type: 'real', slice: { start: 8 } } },
  GET_SET_TEMP_SAFETY_DELTA: { name: 'IN_SP_2', reply: { type: 'real', slice: { start: 8 } } },
  GET_SET_MOTOR_SPEED: { name: 'IN_SP_3', reply: { type: 'real', slice: { start: 8 } } },
  QUERY_TEMP_SENSOR_TYPE: { name: 'IN_MODE_1', reply: { type: 'integer', slice: { start: 10 } } },
  QUERY_RESET_MODE: { name: 'IN_MODE_2', reply: { type: 'integer', slice: { start: 10 } } },
  QUERY_TEMP_MODE: { name: 'IN_MODE_4', reply: { type: 'integer', slice: { start: 10 } } },
  QUERY_STATUS: { name: 'STATUS', reply: { type: 'integer', slice: { start: 7 } } },

  // Configuration
  PROTOCOL_NEW: { name: 'PA_NEW', reply: { type: 'string' } },
  SOFTWARE_VERSION: { name: 'SW_VERS', reply: { type: 'string' } },
  CHECK_CONNECTION_ON: { name: 'CC_ON', reply: { type: 'string' } },
  CHECK_CONNECTION_OFF: { name: 'CC_OFF', reply: { type: 'string' } },
} as const);

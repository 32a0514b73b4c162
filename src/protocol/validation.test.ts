import { describe, expect, it } from 'vitest';
import { CarouselCommands } from '../devices/carousel-commands';
import { InvalidArgumentError } from '../exceptions';
import { validateArgument } from './validation';

describe('validateArgument', () => {
  it.each([20, 21, 150, 299, 300])('accepts SET_TEMP %d inside [20, 300]', (value) => {
    expect(() => validateArgument(CarouselCommands.SET_TEMP, value)).not.toThrow();
  });

  it.each([19, 301, -20, 1000])('rejects SET_TEMP %d outside [20, 300]', (value) => {
    expect(() => validateArgument(CarouselCommands.SET_TEMP, value)).toThrow(
      InvalidArgumentError
    );
  });

  it('reports the violated range', () => {
    expect(() => validateArgument(CarouselCommands.SET_TEMP, 19)).toThrow(
      'Argument 19 for OUT_SP_1 outside range [20, 300]'
    );
  });

  it('rejects a fractional value for an integer argument', () => {
    expect(() => validateArgument(CarouselCommands.SET_TEMP, 150.5)).toThrow(
      'Command OUT_SP_1 expects an integer argument, got 150.5'
    );
  });

  it('accepts fractional and whole values for a real argument', () => {
    expect(() => validateArgument(CarouselCommands.SET_SPEED, 100)).not.toThrow();
    expect(() => validateArgument(CarouselCommands.SET_SPEED, 1399.5)).not.toThrow();
  });

  it.each(['150', NaN, Infinity, null, true])('rejects non-numeric argument %s', (value) => {
    expect(() => validateArgument(CarouselCommands.SET_SPEED, value)).toThrow(
      InvalidArgumentError
    );
  });

  it('rejects any argument for a command that takes none', () => {
    expect(() => validateArgument(CarouselCommands.RESET, 1)).toThrow(
      'Command RESET takes no argument, got 1'
    );
  });

  it('accepts a missing argument', () => {
    expect(() => validateArgument(CarouselCommands.SET_TEMP, undefined)).not.toThrow();
    expect(() => validateArgument(CarouselCommands.RESET, undefined)).not.toThrow();
  });

  it('checks bounds inclusively on both ends', () => {
    const command = { name: 'OUT_MODE_2', argumentType: 'integer', bounds: { min: 0, max: 1 } } as const;
    expect(() => validateArgument(command, 0)).not.toThrow();
    expect(() => validateArgument(command, 1)).not.toThrow();
    expect(() => validateArgument(command, 2)).toThrow(InvalidArgumentError);
    expect(() => validateArgument(command, -1)).toThrow(InvalidArgumentError);
  });
});

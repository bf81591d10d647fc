/**
 * Tests for terminal indicator pins
 */

import { createTerminalPins } from './terminal-pins';

describe('createTerminalPins', () => {
  it('should ring the bell when the buzzer turns on', () => {
    const write = jest.fn();
    const pins = createTerminalPins({ write: write }, true);

    pins.buzzer.write(true);
    pins.buzzer.write(true);
    pins.buzzer.write(false);
    pins.buzzer.write(true);

    expect(write).toHaveBeenCalledTimes(2);
    expect(write).toHaveBeenCalledWith('\u0007');
  });

  it('should stay quiet with the bell disabled', () => {
    const write = jest.fn();
    const pins = createTerminalPins({ write: write }, false);

    pins.buzzer.write(true);

    expect(write).not.toHaveBeenCalled();
    expect(pins.getLevels().buzzer).toBe(true);
  });

  it('should keep LED levels', () => {
    const pins = createTerminalPins({ write: jest.fn() }, false);

    pins.alarmLed.write(true);
    pins.heartbeatLed.write(true);
    pins.heartbeatLed.write(false);

    expect(pins.getLevels()).toEqual({ buzzer: false, alarmLed: true, heartbeatLed: false });
  });

  it('should return a snapshot of the levels', () => {
    const pins = createTerminalPins({ write: jest.fn() }, false);
    const before = pins.getLevels();

    pins.buzzer.write(true);
    pins.alarmLed.write(true);

    expect(before).toEqual({ buzzer: false, alarmLed: false, heartbeatLed: false });
    expect(pins.getLevels()).toEqual({ buzzer: true, alarmLed: true, heartbeatLed: false });
  });
});

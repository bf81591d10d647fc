/**
 * Tests for the indicator output writer
 */

import type { IndicatorPins } from '$types/hardware';
import { writeOutputs, describeOutputs } from './outputs';

function makePins() {
  const buzzer = jest.fn();
  const alarmLed = jest.fn();
  const heartbeatLed = jest.fn();
  const pins: IndicatorPins = {
    buzzer: { write: buzzer },
    alarmLed: { write: alarmLed },
    heartbeatLed: { write: heartbeatLed },
  };
  return { pins, buzzer, alarmLed, heartbeatLed };
}

describe('writeOutputs', () => {
  it('should write every pin the first time', () => {
    const m = makePins();
    const levels = { buzzer: false, alarmLed: false, heartbeatLed: true };

    expect(writeOutputs(m.pins, levels, null)).toBe(levels);

    expect(m.buzzer).toHaveBeenCalledWith(false);
    expect(m.alarmLed).toHaveBeenCalledWith(false);
    expect(m.heartbeatLed).toHaveBeenCalledWith(true);
  });

  it('should only write pins that changed', () => {
    const m = makePins();
    const previous = { buzzer: false, alarmLed: false, heartbeatLed: true };

    writeOutputs(m.pins, { buzzer: true, alarmLed: false, heartbeatLed: true }, previous);

    expect(m.buzzer).toHaveBeenCalledTimes(1);
    expect(m.buzzer).toHaveBeenCalledWith(true);
    expect(m.alarmLed).not.toHaveBeenCalled();
    expect(m.heartbeatLed).not.toHaveBeenCalled();
  });
});

describe('describeOutputs', () => {
  it('should show each level as 0 or 1', () => {
    expect(describeOutputs({ buzzer: true, alarmLed: false, heartbeatLed: true })).toBe('BZ:1 AL:0 HB:1');
  });
});

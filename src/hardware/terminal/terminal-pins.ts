/**
 * Terminal indicator pins
 *
 * The LEDs only keep their level, which the simulator reads back. The
 * buzzer rings the terminal bell each time it turns on.
 */

import type { IndicatorPins } from '$types/hardware';
import type { OutputLevels } from '@hardware/outputs';

import type { TerminalOutput } from './terminal-display';

const BELL = '\u0007';

export interface TerminalPins extends IndicatorPins {
  getLevels(): OutputLevels;
}

/**
 * Create terminal pins
 * @param out - Output the bell is written to
 * @param bell - Ring the bell on buzzer edges
 */
export function createTerminalPins(out: TerminalOutput, bell: boolean): TerminalPins {
  let buzzer = false;
  let alarmLed = false;
  let heartbeatLed = false;

  return {
    buzzer: {
      write: function(level: boolean) {
        if (level && !buzzer && bell) {
          out.write(BELL);
        }
        buzzer = level;
      },
    },
    alarmLed: {
      write: function(level: boolean) {
        alarmLed = level;
      },
    },
    heartbeatLed: {
      write: function(level: boolean) {
        heartbeatLed = level;
      },
    },
    getLevels: function(): OutputLevels {
      return { buzzer: buzzer, alarmLed: alarmLed, heartbeatLed: heartbeatLed };
    },
  };
}

/**
 * Terminal character display
 *
 * Stands in for the 16x2 LCD: each frame is drawn as a framed panel,
 * centred the way the LCD positions its cursor. With colour on, a lit
 * backlight shows as white on blue and a dark one as dim gray.
 */

import chalk from 'chalk';

import type { DisplayPort } from '$types/hardware';
import { centerLine } from '@core/display';

/**
 * Where the panel is written (process.stdout in the simulator)
 */
export interface TerminalOutput {
  write(text: string): void;
}

export interface TerminalDisplayOptions {
  width: number;
  color: boolean;
}

/**
 * Terminal display with read access for the simulator and tests
 */
export interface TerminalDisplay extends DisplayPort {
  getLines(): readonly [string, string];
  isBacklightOn(): boolean;
}

/**
 * Build the panel rows for a frame
 * @returns Border, both text rows and border, without colour
 */
export function renderPanel(line1: string, line2: string, width: number): string[] {
  const border = '+' + '-'.repeat(width) + '+';
  return [
    border,
    '|' + centerLine(line1, width).padEnd(width) + '|',
    '|' + centerLine(line2, width).padEnd(width) + '|',
    border,
  ];
}

/**
 * Create a terminal display
 * @param out - Output stream
 * @param options - Display width and colour
 */
export function createTerminalDisplay(out: TerminalOutput, options: TerminalDisplayOptions): TerminalDisplay {
  let line1 = '';
  let line2 = '';
  let backlightOn = true;

  function draw(): void {
    const rows = renderPanel(line1, line2, options.width);
    const styled = options.color
      ? rows.map(function(row) {
        return backlightOn ? chalk.bgBlue.white(row) : chalk.gray(row);
      })
      : rows;
    out.write(styled.join('\n') + '\n');
  }

  return {
    writeLines: function(l1: string, l2: string) {
      line1 = l1;
      line2 = l2;
      draw();
    },
    setBacklight: function(on: boolean) {
      if (on === backlightOn) {
        return;
      }
      backlightOn = on;
      if (!options.color) {
        out.write('(backlight ' + (on ? 'on' : 'off') + ')\n');
        return;
      }
      draw();
    },
    getLines: function() {
      return [line1, line2];
    },
    isBacklightOn: function() {
      return backlightOn;
    },
  };
}

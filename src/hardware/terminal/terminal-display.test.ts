/**
 * Tests for the terminal display
 */

import chalk from 'chalk';

import { createTerminalDisplay, renderPanel } from './terminal-display';

describe('renderPanel', () => {
  it('should centre both lines in a bordered panel', () => {
    expect(renderPanel('OK', '', 16)).toEqual([
      '+----------------+',
      '|       OK       |',
      '|                |',
      '+----------------+',
    ]);
  });

  it('should draw the open gate frame', () => {
    expect(renderPanel('** GATE **', '** OPEN **', 16)).toEqual([
      '+----------------+',
      '|   ** GATE **   |',
      '|   ** OPEN **   |',
      '+----------------+',
    ]);
  });
});

describe('createTerminalDisplay', () => {
  it('should draw each frame without colour', () => {
    const write = jest.fn();
    const display = createTerminalDisplay({ write: write }, { width: 16, color: false });

    display.writeLines('Alarm', 'Suspended');

    expect(write).toHaveBeenCalledWith(
      '+----------------+\n' +
      '|     Alarm      |\n' +
      '|   Suspended    |\n' +
      '+----------------+\n'
    );
    expect(display.getLines()).toEqual(['Alarm', 'Suspended']);
  });

  it('should report backlight changes only', () => {
    const write = jest.fn();
    const display = createTerminalDisplay({ write: write }, { width: 16, color: false });

    display.setBacklight(true);
    expect(write).not.toHaveBeenCalled();

    display.setBacklight(false);
    expect(write).toHaveBeenCalledWith('(backlight off)\n');
    expect(display.isBacklightOn()).toBe(false);
  });

  it('should dim the panel when the backlight goes off in colour', () => {
    const originalLevel = chalk.level;
    chalk.level = 1;
    try {
      const write = jest.fn();
      const display = createTerminalDisplay({ write: write }, { width: 4, color: true });
      display.writeLines('OK', '');
      display.setBacklight(false);

      const rows = renderPanel('OK', '', 4);
      expect(write).toHaveBeenLastCalledWith(rows.map((r) => chalk.gray(r)).join('\n') + '\n');
    } finally {
      chalk.level = originalLevel;
    }
  });
});

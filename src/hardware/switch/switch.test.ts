/**
 * Tests for the debounced switch
 */

import { createDebouncedSwitch } from './switch';

describe('createDebouncedSwitch', () => {
  let level: boolean;
  const read = () => level;

  beforeEach(() => {
    level = false;
  });

  it('should report a press once the level has held for the debounce time', () => {
    const sw = createDebouncedSwitch(read, 50, 0);

    level = true;
    sw.loop(100);
    expect(sw.isPressed()).toBe(false);
    sw.loop(149);
    expect(sw.isPressed()).toBe(false);
    sw.loop(150);
    expect(sw.isPressed()).toBe(true);
  });

  it('should report the press for one loop only', () => {
    const sw = createDebouncedSwitch(read, 50, 0);
    level = true;
    sw.loop(100);
    sw.loop(150);
    expect(sw.isPressed()).toBe(true);
    sw.loop(155);
    expect(sw.isPressed()).toBe(false);
  });

  it('should ignore bounces shorter than the debounce time', () => {
    const sw = createDebouncedSwitch(read, 50, 0);

    level = true;
    sw.loop(100);
    level = false;
    sw.loop(120);
    level = true;
    sw.loop(140);
    sw.loop(180);
    expect(sw.isPressed()).toBe(false);
    sw.loop(190);
    expect(sw.isPressed()).toBe(true);
  });

  it('should not report a press for a level active at startup', () => {
    level = true;
    const sw = createDebouncedSwitch(read, 50, 0);
    sw.loop(100);
    sw.loop(200);
    expect(sw.isPressed()).toBe(false);

    level = false;
    sw.loop(300);
    sw.loop(350);
    level = true;
    sw.loop(400);
    sw.loop(450);
    expect(sw.isPressed()).toBe(true);
  });

  it('should report a new press only after a debounced release', () => {
    const sw = createDebouncedSwitch(read, 50, 0);
    level = true;
    sw.loop(100);
    sw.loop(150);
    expect(sw.isPressed()).toBe(true);

    level = false;
    sw.loop(200);
    level = true;
    sw.loop(220);
    sw.loop(300);
    expect(sw.isPressed()).toBe(false);

    level = false;
    sw.loop(400);
    sw.loop(450);
    expect(sw.isPressed()).toBe(false);
    level = true;
    sw.loop(500);
    sw.loop(550);
    expect(sw.isPressed()).toBe(true);
  });

  it('should debounce across the clock wrap', () => {
    const sw = createDebouncedSwitch(read, 50, 0xFFFFFFFF - 100);
    level = true;
    sw.loop(0xFFFFFFFF - 20);
    sw.loop(28);
    expect(sw.isPressed()).toBe(false);
    sw.loop(29);
    expect(sw.isPressed()).toBe(true);
  });
});

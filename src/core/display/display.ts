/**
 * Display renderer
 *
 * Maps the controller state to two lines of text. Rules are checked in
 * priority order and the first match wins:
 *
 * 1. digit entry in progress → "Enter delay:" / value
 * 2. indefinite suspension   → "Alarm" / "Suspended"
 * 3. timed suspension        → "Alarm paused for" / M:SS remaining
 * 4. gate open               → "** GATE **" / "** OPEN **"
 * 5. otherwise               → "OK" / ""
 */

import type { ClockValue } from '$types/common';
import { elapsed } from '@core/clock';
import { remainingMs } from '@core/suspension';
import { TIME_CONSTANTS } from '@utils/constants';

import type { BacklightTimer, DisplayFrame, DisplayView } from './types';

/**
 * Format a remaining duration as minutes and zero-padded seconds
 * @param ms - Remaining time (ms), rounded down to whole seconds
 * @returns e.g. "11:59", "0:05", "120:00"
 */
export function formatRemaining(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / TIME_CONSTANTS.MS_PER_SECOND);
  const minutes = Math.floor(totalSeconds / TIME_CONSTANTS.SECONDS_PER_MINUTE);
  const seconds = totalSeconds % TIME_CONSTANTS.SECONDS_PER_MINUTE;
  return minutes + ':' + (seconds < 10 ? '0' : '') + seconds;
}

/**
 * Render the frame for the current state
 * @param view - Gate, suspension and digit entry state
 * @param now - Current clock reading
 */
export function renderFrame(view: DisplayView, now: ClockValue): DisplayFrame {
  if (view.digitEntry.kind === 'accumulating') {
    return { line1: 'Enter delay:', line2: String(view.digitEntry.value) };
  }

  const remaining = remainingMs(view.suspension, now);

  if (view.suspension.kind === 'indefinite') {
    return { line1: 'Alarm', line2: 'Suspended' };
  }

  if (remaining !== null) {
    return { line1: 'Alarm paused for', line2: formatRemaining(remaining) };
  }

  if (view.gate === 'open') {
    return { line1: '** GATE **', line2: '** OPEN **' };
  }

  return { line1: 'OK', line2: '' };
}

/**
 * Whether a frame differs from the last one written
 * @param previous - Last frame written, null before the first
 */
export function frameChanged(previous: DisplayFrame | null, next: DisplayFrame): boolean {
  if (previous === null) {
    return true;
  }
  return previous.line1 !== next.line1 || previous.line2 !== next.line2;
}

/**
 * Whether the render cadence has passed since the last render
 */
export function shouldRender(now: ClockValue, lastRenderTime: ClockValue, cadenceMs: number): boolean {
  return elapsed(now, lastRenderTime) > cadenceMs;
}

/**
 * Left offset that centres a line, as the LCD cursor column
 */
export function centerOffset(text: string, width: number): number {
  return Math.max(0, Math.floor((width - text.length) / 2));
}

/**
 * Centre a line within the display width
 *
 * Text longer than the display is clipped, as the LCD would.
 *
 * @returns Line padded with leading spaces
 */
export function centerLine(text: string, width: number): string {
  return (' '.repeat(centerOffset(text, width)) + text).slice(0, width);
}

// ═══════════════════════════════════════════════════════════════
// BACKLIGHT
// ═══════════════════════════════════════════════════════════════

/**
 * Create a backlight timer that is lit from now
 */
export function createBacklightTimer(timeoutMs: number, now: ClockValue): BacklightTimer {
  return {
    timeoutMs: timeoutMs,
    lastActivationTime: now,
    on: true,
  };
}

/**
 * Light the backlight and restart its timeout (MUTABLE)
 * @returns true if the backlight was off
 */
export function activateBacklight(timer: BacklightTimer, now: ClockValue): boolean {
  const wasOff = !timer.on;
  timer.lastActivationTime = now;
  timer.on = true;
  return wasOff;
}

/**
 * Switch the backlight off (MUTABLE)
 * @returns true if the backlight was on
 */
export function deactivateBacklight(timer: BacklightTimer): boolean {
  const wasOn = timer.on;
  timer.on = false;
  return wasOn;
}

/**
 * Whether the backlight should go dark now
 *
 * It stays lit past the timeout while the gate is open, a timed suspension
 * counts down or digits are being entered. An indefinite suspension lets it
 * go dark.
 */
export function shouldBacklightTurnOff(timer: BacklightTimer, view: DisplayView, now: ClockValue): boolean {
  if (!timer.on) {
    return false;
  }
  return elapsed(now, timer.lastActivationTime) >= timer.timeoutMs &&
    view.gate === 'closed' &&
    view.suspension.kind !== 'timed' &&
    view.digitEntry.kind === 'idle';
}

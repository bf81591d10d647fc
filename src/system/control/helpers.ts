/**
 * Control loop helper functions
 *
 * Each process* function handles one stage of a poll. They mutate the
 * controller state in place and log the transitions they cause.
 */

import type { ClockValue } from '$types/common';
import { elapsed } from '@core/clock';
import { isPulseOn, heartbeatLevel } from '@core/pulse';
import { appendDigit, commitEntry, describeSuspension, isSuspended } from '@core/suspension';
import { onGateOpened, resetGateAlarm, applySuspension, expireSuspension } from '@core/gate-alarm';
import {
  renderFrame,
  frameChanged,
  shouldRender,
  activateBacklight,
  deactivateBacklight,
  shouldBacklightTurnOff
} from '@core/display';
import { classifyKey, isOnKeypad, describeKeypadEvent } from '@core/keypad';
import { writeOutputs, describeOutputs } from '@hardware/outputs';
import type { OutputLevels } from '@hardware/outputs';
import { fmtDuration } from '@logging';
import type { Logger } from '@logging';
import type { InputEvent, KeypadEvent, RawInput } from '@events';
import type { GateAlarmState } from '@system/state/types';

import type { Controller } from './types';

/**
 * Translate a raw input into an event
 * @param layout - Keypad rows; keys missing from it are ignored
 * @returns Event, or null for a key with no meaning
 */
export function translateInput(input: RawInput, layout: readonly string[]): InputEvent | null {
  if (input.kind === 'gate') {
    return { type: 'gate_opened' };
  }
  if (!isOnKeypad(layout, input.key)) {
    return null;
  }
  return classifyKey(input.key);
}

/**
 * Log an alarm transition, if there was one
 */
function logAlarmChange(state: GateAlarmState, before: GateAlarmState['alarm'], logger: Logger): void {
  if (before === state.alarm) {
    return;
  }
  if (state.alarm === 'sounding') {
    logger.warning('ALARM ACTIVATED');
  } else {
    logger.info('Alarm silenced');
  }
}

/**
 * Process a gate-opened edge
 */
export function processGateOpened(state: GateAlarmState, now: ClockValue, logger: Logger): void {
  const alarmBefore = state.alarm;

  if (!onGateOpened(state, now)) {
    logger.debug('Gate edge ignored: gate already open');
    return;
  }

  logger.info('Gate open' + (isSuspended(state.suspension) ? ' (alarm suspended: ' + describeSuspension(state.suspension) + ')' : ''));
  logAlarmChange(state, alarmBefore, logger);
}

/**
 * Process a keypad event
 */
export function processKeypadEvent(controller: Controller, event: KeypadEvent, now: ClockValue): void {
  const state = controller.state;
  const logger = controller.logger;
  const alarmBefore = state.alarm;

  if (controller.isDebug) {
    logger.debug('Keypad ' + describeKeypadEvent(event));
  }

  switch (event.type) {
    case 'digit': {
      const editing = state.digitEntry.kind === 'accumulating';
      state.digitEntry = appendDigit(state.digitEntry, event.digit, controller.config.MAX_SUSPEND_MINUTES);
      if (controller.isDebug && state.digitEntry.kind === 'accumulating') {
        logger.debug((editing ? 'Editing' : 'Starting to edit') + ' suspend time, value = ' + state.digitEntry.value);
      }
      break;
    }

    case 'commit': {
      const entry = state.digitEntry;
      const next = commitEntry(entry, now);
      applySuspension(state, next, now);

      if (entry.kind === 'idle') {
        // Pressing '#' again keeps "Suspended" on screen; wake the backlight anyway
        activateBacklight(state.backlight, now);
      }

      if (next.kind === 'timed') {
        logger.info('Alarm suspended for ' + fmtDuration(next.durationMs));
      } else if (next.kind === 'indefinite') {
        logger.info('Alarm suspended until reset');
      } else {
        logger.info('Suspension cancelled' + (state.gate === 'open' ? ', gate is open' : ''));
      }
      break;
    }

    case 'reset':
      resetGateAlarm(state);
      logger.info('Reset: gate closed, alarm cleared');
      break;
  }

  logAlarmChange(state, alarmBefore, logger);
}

/**
 * Apply one translated input event
 */
export function processInputEvent(controller: Controller, event: InputEvent, now: ClockValue): void {
  if (event.type === 'gate_opened') {
    processGateOpened(controller.state, now, controller.logger);
    return;
  }
  processKeypadEvent(controller, event, now);
}

/**
 * End a timed suspension that has run out
 */
export function processSuspensionExpiry(state: GateAlarmState, now: ClockValue, logger: Logger): void {
  if (!expireSuspension(state, now)) {
    return;
  }

  logger.info('Suspension timed out');
  if (state.alarm === 'sounding') {
    logger.warning('ALARM ACTIVATED');
  }
}

/**
 * Render the display and manage the backlight
 *
 * Nothing is drawn while the splash is up. The first frame after it is
 * drawn without waiting for the render cadence.
 */
export function processDisplay(controller: Controller, now: ClockValue): void {
  const state = controller.state;
  const config = controller.config;
  const display = controller.hardware.display;
  let renderNow = false;

  if (state.splashActive) {
    if (elapsed(now, state.startTime) < config.SPLASH_MS) {
      return;
    }
    state.splashActive = false;
    renderNow = true;
  }

  if (renderNow || shouldRender(now, state.lastRenderTime, config.DISPLAY_UPDATE_MS)) {
    state.lastRenderTime = now;
    const frame = renderFrame(state, now);

    if (frameChanged(state.lastFrame, frame)) {
      display.writeLines(frame.line1, frame.line2);
      state.lastFrame = frame;
      activateBacklight(state.backlight, now);
    }
  }

  if (shouldBacklightTurnOff(state.backlight, state, now)) {
    deactivateBacklight(state.backlight);
  }

  if (state.backlight.on !== state.backlightApplied) {
    display.setBacklight(state.backlight.on);
    state.backlightApplied = state.backlight.on;
    if (controller.isDebug) {
      controller.logger.debug('Backlight ' + (state.backlight.on ? 'on' : 'off'));
    }
  }
}

/**
 * Evaluate the pulse cycles for this poll
 */
export function computeOutputs(state: GateAlarmState, now: ClockValue): OutputLevels {
  return {
    buzzer: isPulseOn(now, state.buzzerPulse),
    alarmLed: isPulseOn(now, state.alarmLedPulse),
    heartbeatLed: heartbeatLevel(now, state.heartbeatPulse, isSuspended(state.suspension)),
  };
}

/**
 * Drive buzzer and LEDs
 */
export function processOutputs(controller: Controller, now: ClockValue): void {
  const state = controller.state;
  const levels = computeOutputs(state, now);
  const previous = state.lastOutputs;

  state.lastOutputs = writeOutputs(controller.hardware.pins, levels, previous);

  if (controller.isDebug && previous !== null && describeOutputs(previous) !== describeOutputs(levels)) {
    controller.logger.debug('Outputs ' + describeOutputs(levels));
  }
}

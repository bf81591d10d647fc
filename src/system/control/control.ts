/**
 * Control loop implementation
 *
 * One poll:
 * 1. sample the gate sensor and queue a gate edge
 * 2. drain the inbox and apply each input in arrival order
 * 3. expire a timed suspension that has run out
 * 4. check the state invariants
 * 5. render the display on its cadence and manage the backlight
 * 6. evaluate the pulse cycles and write the outputs
 *
 * Inputs are applied before the expiry check, so a commit in the same poll
 * as an expiry wins.
 */

import type { TimerAPI } from '$types/hardware';
import { InvariantViolationError } from '$types/errors';
import { assertInvariants } from '@core/gate-alarm';

import type { Controller, LoopHandle } from './types';

import {
  translateInput,
  processInputEvent,
  processSuspensionExpiry,
  processDisplay,
  processOutputs
} from './helpers';

/**
 * Run a single poll
 *
 * Errors never escape. A broken invariant stops the loop at once; any other
 * error is counted and the loop stops after MAX_CONSECUTIVE_ERRORS in a row.
 *
 * @param controller - Controller to poll
 * @returns false when the loop must stop
 */
export function run(controller: Controller): boolean {
  const state = controller.state;
  const logger = controller.logger;
  const isDebug = controller.isDebug;
  const t = controller.clock.millis();

  try {
    state.pollCount++;

    const sensor = controller.hardware.gateSensor;
    sensor.loop(t);
    if (sensor.isPressed() && !controller.inbox.push({ kind: 'gate' })) {
      logger.warning('Input inbox full, gate edge dropped');
    }

    // A failing input must not drop the rest of the drained batch
    let inputError: Error | null = null;
    const inputs = controller.inbox.drain();
    for (let i = 0; i < inputs.length; i++) {
      const input = inputs[i];
      const event = translateInput(input, controller.config.KEYPAD_LAYOUT);
      if (event === null) {
        if (isDebug && input.kind === 'key') {
          logger.debug('Ignored key ' + JSON.stringify(input.key));
        }
        continue;
      }
      try {
        processInputEvent(controller, event, t);
      } catch (e) {
        if (inputError === null) {
          inputError = e instanceof Error ? e : new Error(String(e));
        }
      }
    }

    processSuspensionExpiry(state, t, logger);

    assertInvariants(state);

    processDisplay(controller, t);
    processOutputs(controller, t);

    if (inputError !== null) {
      throw inputError;
    }

    state.consecutiveErrors = 0;
    return true;

  } catch (e) {
    if (e instanceof InvariantViolationError) {
      logger.critical(e.message + ' - stopping');
      return false;
    }

    const errorMsg = e instanceof Error ? e.message : String(e);
    logger.critical('Control loop crashed: ' + errorMsg);
    state.consecutiveErrors++;
    state.lastErrorTime = t;

    if (state.consecutiveErrors >= controller.config.MAX_CONSECUTIVE_ERRORS) {
      logger.critical('Too many consecutive errors (' + state.consecutiveErrors + ') - stopping');
      return false;
    }
    return true;
  }
}

/**
 * Start polling on a repeating timer
 *
 * @param controller - Controller to poll
 * @param timerApi - Timer used for the poll interval
 * @param onStop - Called once when the loop stops by itself
 * @returns Handle to stop the loop
 */
export function startLoop(controller: Controller, timerApi: TimerAPI, onStop?: () => void): LoopHandle {
  let handle: number | null = null;

  function stop(): void {
    if (handle !== null) {
      timerApi.clear(handle);
      handle = null;
    }
  }

  function tick(): void {
    if (!run(controller)) {
      stop();
      if (onStop) {
        onStop();
      }
    }
  }

  handle = timerApi.set(controller.config.POLL_PERIOD_MS, true, tick);

  return {
    stop: stop,
    isRunning: function() {
      return handle !== null;
    },
  };
}

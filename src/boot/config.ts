import type { GateAlarmUserConfig, GateAlarmAppConstants, GateAlarmConfig, UserConfigOverrides } from '../types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for timing,
//   feedback and observability.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<GateAlarmUserConfig> = {
  // POLL_PERIOD_MS
  //   Role: Interval between polls of the controller (ms).
  //   Critical: 1–100 ms (error outside); must stay well below DEBOUNCE_MS.
  //   Recommended: 5 ms; fast enough that no key or sensor edge is missed.
  POLL_PERIOD_MS: 5,

  // DEBOUNCE_MS
  //   Role: Time the gate sensor level must hold before it counts (ms).
  //   Critical: 1–1000 ms (error outside).
  //   Recommended: 50 ms for a reed switch.
  DEBOUNCE_MS: 50,

  // MAX_SUSPEND_MINUTES
  //   Role: Largest suspension delay that can be typed on the keypad.
  //   Critical: Integer 1–9999 (error outside); further digits saturate here.
  //   Recommended: 9999 (about a week).
  MAX_SUSPEND_MINUTES: 9999,

  // BUZZER_ON_MS / BUZZER_OFF_MS
  //   Role: Buzzer beep and pause length while the alarm sounds.
  //   Critical: Integer 1–60000 ms each (error outside).
  //   Recommended: 1500 / 1000 ms; loud enough to notice, not continuous.
  BUZZER_ON_MS: 1500,
  BUZZER_OFF_MS: 1000,

  // ALARM_LED_ON_MS / ALARM_LED_OFF_MS
  //   Role: Alarm LED flash while the gate is open.
  //   Critical: Integer 1–60000 ms each (error outside).
  //   Recommended: 250 / 250 ms; a fast flash reads as "attention".
  ALARM_LED_ON_MS: 250,
  ALARM_LED_OFF_MS: 250,

  // HEARTBEAT_ON_MS / HEARTBEAT_OFF_MS
  //   Role: Heartbeat LED blink showing the controller is running.
  //   Critical: Integer 1–60000 ms each (error outside).
  //   Recommended: 100 / 8000 ms; a short blink every few seconds.
  HEARTBEAT_ON_MS: 100,
  HEARTBEAT_OFF_MS: 8000,

  // DISPLAY_UPDATE_MS
  //   Role: Minimum time between display renders (ms).
  //   Critical: 10–5000 ms (error outside).
  //   Recommended: 250 ms; the countdown still ticks every second.
  DISPLAY_UPDATE_MS: 250,

  // BACKLIGHT_TIMEOUT_MS
  //   Role: Time the backlight stays lit after the last display change (ms).
  //   Critical: 1000–600000 ms (error outside).
  //   Recommended: 10000 ms.
  BACKLIGHT_TIMEOUT_MS: 10000,

  // SPLASH_MS
  //   Role: Time the welcome screen stays up at startup (ms).
  //   Critical: 0–10000 ms (error outside); 0 skips straight to the status screen.
  //   Recommended: 2000 ms.
  SPLASH_MS: 2000,

  // CONSOLE_ENABLED
  //   Role: Master switch for console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to the console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation.
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_BUFFER_SIZE
  //   Role: Maximum number of queued console log messages.
  //   Critical: 10–1000 (error outside).
  //   Recommended: 150.
  CONSOLE_BUFFER_SIZE: 150,

  // CONSOLE_INTERVAL_MS
  //   Role: Interval between draining queued console logs in ms.
  //   Critical: 1–200 ms (error outside).
  //   Recommended: 10 ms; keeps up with a burst of keypresses.
  CONSOLE_INTERVAL_MS: 10,

  // CONSOLE_COLOR
  //   Role: Colour log lines and the display panel with ANSI escapes.
  //   Critical: Boolean only.
  //   Recommended: true in a terminal, false when piping to a file.
  CONSOLE_COLOR: true,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL).
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); 0 (DEBUG) logs every keypress and output change.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours of uptime after which INFO logs are suppressed (0 disables).
  //   Critical: 0–720 h (error outside).
  //   Recommended: 24 h.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 24,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change,
//   unless porting to different hardware.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<GateAlarmAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; *_LOG_LEVEL settings must use these.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // MAX_CONSECUTIVE_ERRORS
  //   Role: Polls in a row that may throw before the loop gives up.
  //   Critical: ≥1.
  //   Recommended: 100 (half a second of failures at 5 ms).
  MAX_CONSECUTIVE_ERRORS: 100,

  // INBOX_CAPACITY
  //   Role: Inputs that may queue between two polls before new ones are dropped.
  //   Critical: ≥1.
  //   Recommended: 64; far more than a human can type in one poll.
  INBOX_CAPACITY: 64,

  // ═══════════════════════════════════════════════════════════════
  // HARDWARE CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // LCD_WIDTH
  //   Role: Characters per display line (the display has two lines).
  //   Critical: Must match the display; lines are centred on it.
  LCD_WIDTH: 16,

  // KEYPAD_LAYOUT
  //   Role: Keypad matrix, one string per row. Keys not on it are ignored.
  //   Critical: Must match the keypad wiring.
  //   Recommended: Standard 4x3 telephone layout.
  KEYPAD_LAYOUT: ['123', '456', '789', '*0#'],

  // SPLASH_LINE_1 / SPLASH_LINE_2
  //   Role: Welcome screen text shown at startup.
  //   Critical: At most LCD_WIDTH characters each.
  SPLASH_LINE_1: '** Gate Alarm **',
  SPLASH_LINE_2: '**   Welcome  **',
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────

/**
 * Build a configuration with user overrides applied
 *
 * The result is not validated; run validateConfig() on it before use.
 *
 * @param overrides - Settings from the environment or command line
 */
export function buildConfig(overrides: UserConfigOverrides): GateAlarmConfig {
  return { ...APP_CONSTANTS, ...USER_CONFIG, ...overrides };
}

const CONFIG: GateAlarmConfig = buildConfig({});

export default CONFIG;

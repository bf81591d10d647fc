import type { ClockValue } from '$types/common';
import type { GateAlarmCoreState } from '@core/gate-alarm';
import type { PulseTimer } from '@core/pulse';
import type { BacklightTimer, DisplayFrame } from '@core/display';
import type { OutputLevels } from '@hardware/outputs';

export interface GateAlarmState extends GateAlarmCoreState {
    // ═══════════════════════════════════════════════════════════════
    // CORE: GATE, ALARM, SUSPENSION (inherited)
    // gate, alarm, buzzerPulse, alarmLedPulse, suspension, digitEntry
    // ═══════════════════════════════════════════════════════════════

    // ═══════════════════════════════════════════════════════════════
    // CORE: HEARTBEAT
    // ═══════════════════════════════════════════════════════════════
    heartbeatPulse: PulseTimer;

    // ═══════════════════════════════════════════════════════════════
    // CORE: DISPLAY
    // ═══════════════════════════════════════════════════════════════
    backlight: BacklightTimer;
    lastFrame: DisplayFrame | null;
    lastRenderTime: ClockValue;
    splashActive: boolean;
    backlightApplied: boolean;

    // ═══════════════════════════════════════════════════════════════
    // CORE: OUTPUTS
    // ═══════════════════════════════════════════════════════════════
    lastOutputs: OutputLevels | null;

    // ═══════════════════════════════════════════════════════════════
    // CORE: TIMING
    // ═══════════════════════════════════════════════════════════════
    startTime: ClockValue;
    pollCount: number;

    // ═══════════════════════════════════════════════════════════════
    // CORE: ERROR TRACKING
    // ═══════════════════════════════════════════════════════════════
    consecutiveErrors: number;
    lastErrorTime: ClockValue;
}

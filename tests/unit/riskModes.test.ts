/**
 * Unit tests for risk mode derivation
 */

import { describe, it, expect } from 'vitest';
import {
  computeMarginState,
  determineRiskMode,
  modeRank,
  isStricter,
  buildRiskCommand,
  buildFailsafeCommand,
  type CommandSettings,
} from '../../src/risk/riskModes.js';
import { DEFAULTS, RISK_MODES } from '../../src/config/constants.js';
import { InvalidMarginDataError } from '../../src/utils/errors.js';

const SETTINGS: CommandSettings = {
  thresholds: { ...DEFAULTS.RISK_THRESHOLDS },
  targetAfterDerisk: 0.6,
  targetAfterEmergency: 0.58,
};

const TS = '2026-03-01T12:00:00.000Z';

describe('Risk modes', () => {
  describe('computeMarginState', () => {
    it('should derive utilization from used initial margin over equity', () => {
      const state = computeMarginState({ totalEquity: 1000, usedInitialMargin: 750, freeMargin: 250 }, 42);

      expect(state.utilization).toBe(0.75);
      expect(state.measuredAt).toBe(42);
      expect(state.freeMargin).toBe(250);
    });

    it('should clamp utilization to 1', () => {
      const state = computeMarginState({ totalEquity: 100, usedInitialMargin: 130, freeMargin: -30 });
      expect(state.utilization).toBe(1);
    });

    it('should reject zero, negative and non-finite equity', () => {
      expect(() => computeMarginState({ totalEquity: 0, usedInitialMargin: 0, freeMargin: 0 })).toThrow(
        InvalidMarginDataError
      );
      expect(() => computeMarginState({ totalEquity: -5, usedInitialMargin: 0, freeMargin: 0 })).toThrow(
        'Total equity must be positive, got -5'
      );
      expect(() => computeMarginState({ totalEquity: NaN, usedInitialMargin: 0, freeMargin: 0 })).toThrow(
        InvalidMarginDataError
      );
    });

    it('should reject negative used margin', () => {
      expect(() => computeMarginState({ totalEquity: 100, usedInitialMargin: -1, freeMargin: 101 })).toThrow(
        'Used initial margin must be non-negative, got -1'
      );
    });
  });

  describe('determineRiskMode', () => {
    it('should map the utilization sequence to modes and entry permissions', () => {
      const sequence = [0.55, 0.62, 0.75, 0.92, 0.1];

      const modes = sequence.map((u) => determineRiskMode(u));
      const allow = sequence.map((u) => buildRiskCommand(determineRiskMode(u), u, SETTINGS, TS).allowNewEntries);

      expect(modes).toEqual(['NORMAL', 'ALERT', 'DERISK', 'HALT', 'NORMAL']);
      expect(allow).toEqual([true, true, false, false, true]);
    });

    it('should include each threshold in the mode above it', () => {
      expect(determineRiskMode(0.6)).toBe(RISK_MODES.ALERT);
      expect(determineRiskMode(0.7)).toBe(RISK_MODES.DERISK);
      expect(determineRiskMode(0.8)).toBe(RISK_MODES.EMERGENCY);
      expect(determineRiskMode(0.9)).toBe(RISK_MODES.HALT);
      expect(determineRiskMode(0.5999)).toBe(RISK_MODES.NORMAL);
      expect(determineRiskMode(0)).toBe(RISK_MODES.NORMAL);
      expect(determineRiskMode(1)).toBe(RISK_MODES.HALT);
    });

    it('should be non-decreasing in utilization', () => {
      let previous = -1;
      for (let i = 0; i <= 1000; i++) {
        const rank = modeRank(determineRiskMode(i / 1000));
        expect(rank).toBeGreaterThanOrEqual(previous);
        previous = rank;
      }
    });

    it('should honor custom thresholds', () => {
      const thresholds = { alert: 0.5, derisk: 0.6, emergency: 0.7, halt: 0.8 };
      expect(determineRiskMode(0.55, thresholds)).toBe(RISK_MODES.ALERT);
      expect(determineRiskMode(0.85, thresholds)).toBe(RISK_MODES.HALT);
    });
  });

  describe('buildRiskCommand', () => {
    it('should build the HALT command', () => {
      const command = buildRiskCommand(RISK_MODES.HALT, 0.93, SETTINGS, TS);

      expect(command).toEqual({
        mode: 'HALT',
        utilization: 0.93,
        allowNewEntries: false,
        cancelAllOrders: true,
        closePositions: true,
        closeFraction: 1,
        targetUtilization: null,
        priority: 'IMMEDIATE',
        message: '≥90% IM - EMERGENCY SHUTDOWN',
        timestamp: TS,
      });
    });

    it('should build the EMERGENCY command', () => {
      const command = buildRiskCommand(RISK_MODES.EMERGENCY, 0.85, SETTINGS, TS);

      expect(command.closeFraction).toBe(0.33);
      expect(command.targetUtilization).toBe(0.58);
      expect(command.priority).toBe('HIGH');
      expect(command.message).toBe('80-90% IM - Emergency deleverage to 58%');
    });

    it('should build the DERISK command', () => {
      const command = buildRiskCommand(RISK_MODES.DERISK, 0.75, SETTINGS, TS);

      expect(command.allowNewEntries).toBe(false);
      expect(command.cancelAllOrders).toBe(true);
      expect(command.closeFraction).toBe(0.25);
      expect(command.targetUtilization).toBe(0.6);
      expect(command.priority).toBe('MEDIUM');
      expect(command.message).toBe('70-80% IM - Active deleverage to 60%');
    });

    it('should build the ALERT and NORMAL commands without closes', () => {
      const alert = buildRiskCommand(RISK_MODES.ALERT, 0.65, SETTINGS, TS);
      const normal = buildRiskCommand(RISK_MODES.NORMAL, 0.2, SETTINGS, TS);

      expect(alert.allowNewEntries).toBe(true);
      expect(alert.closePositions).toBe(false);
      expect(alert.priority).toBe('LOW');
      expect(alert.message).toBe('60-70% IM - Recommend reducing order sizes');
      expect(normal.cancelAllOrders).toBe(false);
      expect(normal.priority).toBe('NONE');
      expect(normal.message).toBe('Normal trading - All systems operational');
    });
  });

  describe('fail-safe command', () => {
    it('should halt and cancel without closing', () => {
      const command = buildFailsafeCommand(3, 0.42, null, TS);

      expect(command.mode).toBe('HALT');
      expect(command.allowNewEntries).toBe(false);
      expect(command.cancelAllOrders).toBe(true);
      expect(command.closePositions).toBe(false);
      expect(command.closeFraction).toBe(0);
      expect(command.utilization).toBe(0.42);
      expect(command.message).toBe('API failures - emergency halt after 3 errors');
    });

    it('should assume full utilization when none was ever measured', () => {
      expect(buildFailsafeCommand(5, null, null, TS).utilization).toBe(1);
    });

    it('should keep deleveraging when replacing a closing command', () => {
      const emergency = buildRiskCommand(RISK_MODES.EMERGENCY, 0.85, SETTINGS, TS);

      const command = buildFailsafeCommand(3, 0.85, emergency, TS);

      expect(command.mode).toBe('HALT');
      expect(command.closePositions).toBe(true);
      expect(command.closeFraction).toBe(0.33);
      expect(command.targetUtilization).toBe(0.58);
    });

    it('should not close when the replaced command did not', () => {
      const alert = buildRiskCommand(RISK_MODES.ALERT, 0.65, SETTINGS, TS);

      const command = buildFailsafeCommand(3, 0.65, alert, TS);

      expect(command.closePositions).toBe(false);
      expect(command.closeFraction).toBe(0);
      expect(command.targetUtilization).toBeNull();
    });

    it('should only count as stricter than a laxer command', () => {
      const emergency = buildRiskCommand(RISK_MODES.EMERGENCY, 0.85, SETTINGS, TS);

      expect(isStricter(buildFailsafeCommand(3, 0.5, null, TS), null)).toBe(true);
      expect(isStricter(buildFailsafeCommand(3, 0.85, emergency, TS), emergency)).toBe(true);
      expect(isStricter(buildFailsafeCommand(3, 0.95, null, TS), buildRiskCommand(RISK_MODES.HALT, 0.95, SETTINGS, TS))).toBe(
        false
      );
    });

    it('should not count a higher mode that stops closing as stricter', () => {
      const emergency = buildRiskCommand(RISK_MODES.EMERGENCY, 0.85, SETTINGS, TS);
      const haltWithoutCloses = buildFailsafeCommand(3, 0.85, null, TS);

      expect(isStricter(haltWithoutCloses, emergency)).toBe(false);
    });

    it('should count a tighter instruction at the same mode as stricter', () => {
      const normal = buildRiskCommand(RISK_MODES.NORMAL, 0.3, SETTINGS, TS);

      expect(isStricter({ ...normal, allowNewEntries: false }, normal)).toBe(true);
      expect(isStricter(normal, normal)).toBe(false);
      expect(isStricter(normal, { ...normal, allowNewEntries: false })).toBe(false);
    });
  });
});

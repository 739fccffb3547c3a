import { describe, it, expect } from 'vitest';
import { RiskGate } from '../src/risk/risk-gate.js';

const limits = {
  maxTradesPerDay: 10,
  cooldownSeconds: 60,
  maxDailyLossPct: 3,
  startEquity: 1000,
  takerFeePct: 0.1,
};

const idle = { now: 1_000_000, tradesToday: 0, lastTradeTs: null, realizedPnlToday: 0 };

describe('RiskGate', () => {
  const gate = new RiskGate(limits);

  it('should allow a fresh day', () => {
    expect(gate.canTrade(idle)).toEqual({ allowed: true });
  });

  it('should block at the daily trade cap regardless of other inputs', () => {
    expect(gate.canTrade({ ...idle, tradesToday: 10, realizedPnlToday: -500, lastTradeTs: idle.now })).toEqual({
      allowed: false,
      reason: 'max trades/day',
    });
  });

  it('should enforce cooldown since the last trade', () => {
    expect(gate.canTrade({ ...idle, lastTradeTs: idle.now - 50_000 })).toEqual({ allowed: false, reason: 'cooldown' });
    expect(gate.canTrade({ ...idle, lastTradeTs: idle.now - 60_000 }).allowed).toBe(true);
  });

  it('should trip the kill-switch past the daily loss threshold', () => {
    expect(gate.dailyLossLimit()).toBeCloseTo(30, 9);
    expect(gate.canTrade({ ...idle, realizedPnlToday: -31 })).toEqual({ allowed: false, reason: 'kill-switch' });
    expect(gate.canTrade({ ...idle, realizedPnlToday: -29 }).allowed).toBe(true);
  });

  it('should re-evaluate the kill-switch every call', () => {
    expect(gate.canTrade({ ...idle, realizedPnlToday: -40 }).allowed).toBe(false);
    expect(gate.canTrade({ ...idle, realizedPnlToday: 0 }).allowed).toBe(true);
  });

  it('should disable the kill-switch at 0%', () => {
    const off = new RiskGate({ ...limits, maxDailyLossPct: 0 });
    expect(off.canTrade({ ...idle, realizedPnlToday: -10_000 }).allowed).toBe(true);
  });

  it('should charge taker fee on absolute notional', () => {
    expect(gate.applyFees(1000)).toBeCloseTo(1, 9);
    expect(gate.applyFees(-1000)).toBeCloseTo(1, 9);
  });
});

import { describe, it, expect } from 'vitest';
import { AtrBandStrategy } from '../src/strategy/atr-band.js';

describe('AtrBandStrategy', () => {
  const strategy = new AtrBandStrategy({ k: 1, stopLossAtr: 1, stopEnabled: true });

  describe('FLAT', () => {
    it('should buy at or below ref - k*atr', () => {
      expect(strategy.evaluate({ price: 97, atr: 2, mode: 'FLAT', refPrice: 100 })).toEqual({
        action: 'BUY',
        reason: 'entry',
        stopPrice: 95,
      });
      expect(strategy.evaluate({ price: 98, atr: 2, mode: 'FLAT', refPrice: 100 }).action).toBe('BUY');
    });

    it('should do nothing above the trigger', () => {
      expect(strategy.evaluate({ price: 99, atr: 2, mode: 'FLAT', refPrice: 100 })).toEqual({ action: 'NONE' });
    });

    it('should use the current price as baseline without a ref', () => {
      expect(strategy.evaluate({ price: 50, atr: 2, mode: 'FLAT', refPrice: null }).action).toBe('NONE');
    });

    it('should omit the stop price when stops are disabled', () => {
      const noStop = new AtrBandStrategy({ k: 1, stopEnabled: false });
      expect(noStop.evaluate({ price: 97, atr: 2, mode: 'FLAT', refPrice: 100 })).toEqual({
        action: 'BUY',
        reason: 'entry',
      });
    });
  });

  describe('LONG', () => {
    it('should take profit at ref + k*atr', () => {
      expect(strategy.evaluate({ price: 103, atr: 2, mode: 'LONG', refPrice: 100 })).toEqual({
        action: 'SELL',
        reason: 'take-profit',
      });
    });

    it('should stop out at ref - stopLossAtr*atr', () => {
      expect(strategy.evaluate({ price: 97.5, atr: 2, mode: 'LONG', refPrice: 100 })).toEqual({
        action: 'SELL',
        reason: 'stop-loss',
      });
    });

    it('should hold inside the band', () => {
      expect(strategy.evaluate({ price: 101, atr: 2, mode: 'LONG', refPrice: 100 }).action).toBe('NONE');
    });

    it('should hold through the stop level when stops are disabled', () => {
      const noStop = new AtrBandStrategy({ k: 1, stopEnabled: false, stopLossAtr: 1 });
      expect(noStop.evaluate({ price: 97.5, atr: 2, mode: 'LONG', refPrice: 100 }).action).toBe('NONE');
    });
  });

  it('should never signal without a positive ATR', () => {
    expect(strategy.evaluate({ price: 1, atr: null, mode: 'FLAT', refPrice: 100 }).action).toBe('NONE');
    expect(strategy.evaluate({ price: 1, atr: 0, mode: 'FLAT', refPrice: 100 }).action).toBe('NONE');
    expect(strategy.evaluate({ price: 1000, atr: 0, mode: 'LONG', refPrice: 100 }).action).toBe('NONE');
  });

  it('should apply default params', () => {
    expect(new AtrBandStrategy().params).toEqual({ k: 1.5, stopEnabled: true, stopLossAtr: 1 });
  });
});

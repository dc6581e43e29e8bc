import { describe, it, expect } from 'vitest';
import {
  renderGauge,
  renderJson,
  renderPlain,
  renderRatio,
  selectOutputMode,
} from '../../features/ratio/renderers.js';
import type { RatioResult } from '../../features/ratio/types.js';

const GOLD_CAP = 2559.15 * 212582 * 35273.96194958;

const appleVsGold: RatioResult = {
  ratio: 3.387e12 / GOLD_CAP,
  percentage: 17,
  numerator: { asset: 'AAPL', marketCap: 3.387e12 },
  denominator: { asset: 'gold', marketCap: GOLD_CAP },
};

describe('renderers', () => {
  describe('selectOutputMode', () => {
    it('should default to the gauge', () => {
      expect(selectOutputMode({})).toBe('gauge');
      expect(selectOutputMode({ plain: false, json: false })).toBe('gauge');
    });

    it('should prefer plain over json', () => {
      expect(selectOutputMode({ plain: true, json: true })).toBe('plain');
    });

    it('should select json on its own', () => {
      expect(selectOutputMode({ json: true })).toBe('json');
    });
  });

  describe('renderGauge', () => {
    it('should render an empty bar for 0', () => {
      expect(renderGauge(0)).toBe(`[${' '.repeat(40)}] 0%`);
    });

    it('should render a full bar for 1', () => {
      expect(renderGauge(1)).toBe(`[${'█'.repeat(40)}] 100%`);
    });

    it('should round half cells and the percentage away from zero', () => {
      // 0.1875 × 40 = 7.5 cells, 18.75%
      expect(renderGauge(0.1875)).toBe(`[${'█'.repeat(8)}${' '.repeat(32)}] 19%`);
    });

    it('should honour a custom length', () => {
      expect(renderGauge(0.5, { length: 10 })).toBe('[█████     ] 50%');
    });

    it('should colour only the filled cells', () => {
      expect(renderGauge(0.5, { color: true })).toBe(
        `[\u001b[32m${'█'.repeat(20)}\u001b[0m${' '.repeat(20)}] 50%`
      );
      expect(renderGauge(0, { color: true })).toBe(`[${' '.repeat(40)}] 0%`);
    });

    it('should keep the filled count within the bar', () => {
      for (let i = 0; i <= 100; i++) {
        const bar = renderGauge(i / 100);
        const filled = [...bar].filter((c) => c === '█').length;
        expect(filled).toBeGreaterThanOrEqual(0);
        expect(filled).toBeLessThanOrEqual(40);
        expect(bar.indexOf(']')).toBe(41);
      }
    });

    it.each([1.01, -0.1, Number.NaN])('should throw RangeError for %s', (ratio) => {
      expect(() => renderGauge(ratio)).toThrow(RangeError);
    });
  });

  describe('renderPlain', () => {
    it('should print numerator, denominator and truncated percentage', () => {
      expect(renderPlain(appleVsGold)).toBe('AAPL gold 17');
    });
  });

  describe('renderJson', () => {
    it('should print compact JSON with integer market caps', () => {
      expect(renderJson(appleVsGold)).toBe(
        '{"percentage":17,"numerator":{"asset":"AAPL","market_cap":3387000000000},"denominator":{"asset":"gold","market_cap":19190066192691}}'
      );
    });
  });

  describe('renderRatio', () => {
    it('should add formatted market caps under the gauge', () => {
      expect(renderRatio(appleVsGold, 'gauge')).toEqual([
        `[${'█'.repeat(7)}${' '.repeat(33)}] 18%`,
        'AAPL: 3.4T',
        'gold: 19.2T',
      ]);
    });

    it('should return a single line for plain and json', () => {
      expect(renderRatio(appleVsGold, 'plain')).toEqual(['AAPL gold 17']);
      expect(renderRatio(appleVsGold, 'json')).toHaveLength(1);
    });
  });
});

/**
 * Export Plan Tests
 */

import { describe, it, expect } from 'vitest';
import { planSheetNames, sanitizeSheetName } from './ExportPlan.js';

describe('ExportPlan', () => {
  describe('sanitizeSheetName', () => {
    it('should remove forbidden characters', () => {
      expect(sanitizeSheetName('Q1/Q2 [draft]: a*b?c\\d')).toBe('Q1Q2 draft abcd');
    });

    it('should truncate to 31 characters', () => {
      expect(sanitizeSheetName('x'.repeat(40))).toBe('x'.repeat(31));
    });

    it('should fall back for empty names', () => {
      expect(sanitizeSheetName('[]')).toBe('Sheet');
      expect(sanitizeSheetName('   ')).toBe('Sheet');
    });
  });

  describe('planSheetNames', () => {
    it('should suffix repeats', () => {
      expect(planSheetNames(['Data', 'Data', 'data', 'Other'])).toEqual(['Data', 'Data (2)', 'data (3)', 'Other']);
    });

    it('should make names unique after sanitising', () => {
      expect(planSheetNames(['A/B', 'AB'])).toEqual(['AB', 'AB (2)']);
    });

    it('should keep suffixed names within the limit', () => {
      const long = 'y'.repeat(35);
      const [first, second] = planSheetNames([long, long]);
      expect(first).toBe('y'.repeat(31));
      expect(second).toBe(`${'y'.repeat(27)} (2)`);
      expect(second).toHaveLength(31);
    });
  });
});

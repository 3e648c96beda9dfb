import { selectTrial, stableBucket, stableHash64 } from '../../../services/selection/StickyTrialRouter';
import { StickyRoutingError } from '../../../types/ExperimentErrors';

describe('StickyTrialRouter', () => {
  describe('stableHash64', () => {
    it('should read the first 8 bytes of SHA-256(identity \\u0001 experiment) big-endian', () => {
      expect(stableHash64('user-42', 'checkout')).toBe(1759836557823940976n);
      expect(stableHash64('user-7', 'ISearchService')).toBe(18204020320194667005n);
    });
  });

  describe('stableBucket', () => {
    it('should reduce the hash modulo the bucket count', () => {
      expect(stableBucket('user-42', 'checkout', 100)).toBe(76);
      expect(stableBucket('user-7', 'ISearchService', 100)).toBe(5);
    });
  });

  describe('selectTrial', () => {
    const keys = ['a', 'b', 'c'];

    it('should index into the sorted key list', () => {
      expect(selectTrial('user-42', 'checkout', keys)).toBe('c');
      expect(selectTrial('user-7', 'ISearchService', keys)).toBe('a');
    });

    it('should be deterministic for identical inputs', () => {
      const first = selectTrial('user-123', 'checkout', keys);

      for (let i = 0; i < 20; i++) {
        expect(selectTrial('user-123', 'checkout', keys)).toBe(first);
      }
    });

    it('should not depend on key order', () => {
      for (let i = 0; i < 50; i++) {
        const identity = `user-${i}`;
        expect(selectTrial(identity, 'checkout', ['c', 'a', 'b'])).toBe(selectTrial(identity, 'checkout', keys));
      }
    });

    it('should reach every key across a population of identities', () => {
      const seen = new Set<string>();
      for (let i = 0; i < 300; i++) {
        seen.add(selectTrial(`user-${i}`, 'checkout', keys));
      }

      expect(Array.from(seen).sort()).toEqual(['a', 'b', 'c']);
    });

    it('should assign independently per experiment name', () => {
      let differing = 0;
      for (let i = 0; i < 100; i++) {
        if (selectTrial(`user-${i}`, 'checkout', keys) !== selectTrial(`user-${i}`, 'search', keys)) {
          differing++;
        }
      }

      expect(differing).toBeGreaterThan(0);
    });

    it('should return the only key without hashing', () => {
      expect(selectTrial('anyone', 'checkout', ['solo'])).toBe('solo');
    });

    it('should fail loudly with zero keys', () => {
      expect(() => selectTrial('user-1', 'checkout', [])).toThrow(StickyRoutingError);
      expect(() => selectTrial('user-1', 'checkout', [])).toThrow(
        "No trial keys available for sticky routing of 'checkout'"
      );
    });
  });
});

import * as fc from 'fast-check';
import { AdmissionService, AdmissionPolicies, admissionIdentity } from '../../../../src/services/admission';
import { ThrottledError } from '../../../../src/domain/errors';

const policies: AdmissionPolicies = {
  upload: { capacity: 3, refillPerSecond: 1 },
  transform: { capacity: 3, refillPerSecond: 1 },
  read: { capacity: 10, refillPerSecond: 5 },
};

function createAdmission(clock: { now: number }, maxTrackedBuckets = 1000): AdmissionService {
  return new AdmissionService({ policies, maxTrackedBuckets, now: () => clock.now });
}

describe('Admission Property Tests', () => {
  describe('Property 30: Burst Capacity', () => {
    it('should admit at most the burst capacity without refill', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 30 }), (attempts) => {
          const admission = createAdmission({ now: 0 });
          let allowed = 0;
          for (let i = 0; i < attempts; i++) {
            if (admission.allow('user-1', 'transform')) allowed++;
          }
          expect(allowed).toBe(Math.min(attempts, policies.transform.capacity));
        }),
        { numRuns: 50 }
      );
    });

    it('should throttle the request after the burst with a retry hint', () => {
      const admission = createAdmission({ now: 0 });

      expect(admission.check('user-1', 'transform')).toEqual({ allowed: true, limit: 3, remaining: 2, retryAfterMs: 0 });
      admission.check('user-1', 'transform');
      admission.check('user-1', 'transform');

      expect(admission.check('user-1', 'transform')).toEqual({ allowed: false, limit: 3, remaining: 0, retryAfterMs: 1000 });
    });

    it('should throw a throttled error from enforce', () => {
      const admission = createAdmission({ now: 0 });
      for (let i = 0; i < 3; i++) admission.enforce('user-1', 'upload');

      let thrown: unknown;
      try {
        admission.enforce('user-1', 'upload');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ThrottledError);
      if (thrown instanceof ThrottledError) {
        expect(thrown.retryAfterMs).toBe(1000);
        expect(thrown.retryAfterSeconds).toBe(1);
      }
    });
  });

  describe('Property 31: Isolation', () => {
    it('should not let one identity consume another identity\'s tokens', () => {
      fc.assert(
        fc.property(fc.string({ minLength: 1, maxLength: 10 }), fc.string({ minLength: 1, maxLength: 10 }), (a, b) => {
          fc.pre(a !== b);
          const admission = createAdmission({ now: 0 });
          for (let i = 0; i < 10; i++) admission.allow(a, 'transform');

          expect(admission.allow(a, 'transform')).toBe(false);
          expect(admission.allow(b, 'transform')).toBe(true);
        }),
        { numRuns: 50 }
      );
    });

    it('should keep action classes separate', () => {
      const admission = createAdmission({ now: 0 });
      for (let i = 0; i < 3; i++) admission.allow('user-1', 'upload');

      expect(admission.allow('user-1', 'upload')).toBe(false);
      expect(admission.allow('user-1', 'transform')).toBe(true);
      expect(admission.allow('user-1', 'read')).toBe(true);
    });
  });

  describe('Property 32: Refill', () => {
    it('should refill continuously at the configured rate', () => {
      const clock = { now: 0 };
      const admission = createAdmission(clock);
      for (let i = 0; i < 3; i++) admission.allow('user-1', 'transform');

      clock.now = 500;
      expect(admission.check('user-1', 'transform')).toMatchObject({ allowed: false, retryAfterMs: 500 });

      clock.now = 1000;
      expect(admission.check('user-1', 'transform').allowed).toBe(true);
    });

    it('should not refill beyond capacity', () => {
      const clock = { now: 0 };
      const admission = createAdmission(clock);
      admission.allow('user-1', 'transform');

      clock.now = 60_000;
      let allowed = 0;
      for (let i = 0; i < 10; i++) {
        if (admission.allow('user-1', 'transform')) allowed++;
      }
      expect(allowed).toBe(3);
    });
  });

  describe('Property 33: Bucket Pruning', () => {
    it('should drop buckets that have refilled', () => {
      const clock = { now: 0 };
      const admission = createAdmission(clock);
      admission.allow('user-1', 'transform');
      admission.allow('user-2', 'transform');

      expect(admission.prune(0)).toBe(0);
      expect(admission.prune(1000)).toBe(2);
      expect(admission.trackedBuckets()).toBe(0);
    });

    it('should prune when the tracked bucket limit is exceeded', () => {
      const clock = { now: 0 };
      const admission = createAdmission(clock, 2);
      admission.allow('user-1', 'transform');
      admission.allow('user-2', 'transform');

      clock.now = 10_000;
      admission.allow('user-3', 'transform');

      expect(admission.trackedBuckets()).toBe(1);
    });
  });

  describe('admissionIdentity', () => {
    it('should prefer the user and fall back to the address', () => {
      expect(admissionIdentity('user-1', '10.0.0.1')).toBe('user-1');
      expect(admissionIdentity(undefined, '10.0.0.1')).toBe('ip:10.0.0.1');
    });
  });
});

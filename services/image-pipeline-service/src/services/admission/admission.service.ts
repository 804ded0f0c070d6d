import { AppError } from '@domain/errors';
import { ActionClass } from '@domain/types/common';
import { recordAdmission } from '@infrastructure/observability/metrics';

export interface BucketPolicy {
  capacity: number;
  refillPerSecond: number;
}

export type AdmissionPolicies = Record<ActionClass, BucketPolicy>;

export interface AdmissionOptions {
  policies: AdmissionPolicies;
  maxTrackedBuckets: number;
  now?: () => number;
}

export interface AdmissionDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** 0 when allowed; otherwise time until one token is available. */
  retryAfterMs: number;
}

interface Bucket {
  tokens: number;
  updatedAt: number;
}

/**
 * Token bucket per (identity, action class). Buckets start full and refill
 * continuously; one identity draining its bucket never touches another's.
 */
export class AdmissionService {
  private readonly buckets = new Map<string, Bucket>();
  private readonly now: () => number;

  constructor(private readonly options: AdmissionOptions) {
    this.now = options.now ?? Date.now;
  }

  check(identity: string, action: ActionClass): AdmissionDecision {
    const policy = this.options.policies[action];
    const key = `${action}:${identity}`;
    const now = this.now();
    const bucket = this.refill(this.buckets.get(key), policy, now);

    let decision: AdmissionDecision;
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      decision = { allowed: true, limit: policy.capacity, remaining: Math.floor(bucket.tokens), retryAfterMs: 0 };
    } else {
      decision = {
        allowed: false,
        limit: policy.capacity,
        remaining: 0,
        retryAfterMs: Math.ceil(((1 - bucket.tokens) / policy.refillPerSecond) * 1000),
      };
    }

    this.buckets.set(key, bucket);
    if (this.buckets.size > this.options.maxTrackedBuckets) {
      this.prune(now);
    }

    recordAdmission(action, decision.allowed);
    return decision;
  }

  allow(identity: string, action: ActionClass): boolean {
    return this.check(identity, action).allowed;
  }

  enforce(identity: string, action: ActionClass): AdmissionDecision {
    const decision = this.check(identity, action);
    if (!decision.allowed) {
      throw AppError.rateLimitExceeded(`Too many ${action} requests`, decision.retryAfterMs, {
        action,
        limit: decision.limit,
      });
    }
    return decision;
  }

  trackedBuckets(): number {
    return this.buckets.size;
  }

  /** Drops buckets that have refilled to capacity; they are indistinguishable from new ones. */
  prune(now: number = this.now()): number {
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      const action = actionOf(key);
      if (!action) continue;
      const policy = this.options.policies[action];
      if (this.refill(bucket, policy, now).tokens >= policy.capacity) {
        this.buckets.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private refill(bucket: Bucket | undefined, policy: BucketPolicy, now: number): Bucket {
    if (!bucket) {
      return { tokens: policy.capacity, updatedAt: now };
    }
    const elapsedSeconds = Math.max(0, now - bucket.updatedAt) / 1000;
    bucket.tokens = Math.min(policy.capacity, bucket.tokens + elapsedSeconds * policy.refillPerSecond);
    bucket.updatedAt = now;
    return bucket;
  }
}

function actionOf(key: string): ActionClass | undefined {
  const action = key.slice(0, key.indexOf(':'));
  switch (action) {
    case 'upload':
    case 'transform':
    case 'read':
      return action;
    default:
      return undefined;
  }
}

/** Identity used for admission: the authenticated user, else the client address. */
export function admissionIdentity(userId: string | undefined, address: string): string {
  return userId ? userId : `ip:${address}`;
}

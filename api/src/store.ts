export const ROLES = ['farmer', 'buyer', 'admin'] as const;
export type Role = (typeof ROLES)[number];

export const OTP_PURPOSES = ['login', 'password-reset', 'verification', 'registration'] as const;
export type OtpPurpose = (typeof OTP_PURPOSES)[number];

export const PURPOSE_LABELS: Record<OtpPurpose, string> = {
  login: 'Login',
  'password-reset': 'Password Reset',
  verification: 'Email Verification',
  registration: 'Registration'
};

export type OtpRecord = {
  readonly email: string;
  readonly purpose: OtpPurpose;
  readonly code: string;
  readonly issuedAt: number;
  readonly expiresAt: number;
  readonly template: OtpTemplate;
};

export type OtpTemplate = {
  readonly subject: string;
  readonly html: string;
  readonly text: string;
};

export type ClientBucket = {
  readonly count: number;
  readonly windowStart: number;
};

export interface BucketStore {
  get(clientKey: string): ClientBucket | undefined;
  set(clientKey: string, bucket: ClientBucket): void;
  delete(clientKey: string): void;
  entries(): IterableIterator<[string, ClientBucket]>;
}

export interface OtpStore {
  get(key: string): OtpRecord | undefined;
  put(key: string, record: OtpRecord): void;
  delete(key: string): void;
}

// Process-local state. Nothing here survives a restart or is shared between instances.
export class MemoryBucketStore implements BucketStore {
  private readonly buckets = new Map<string, ClientBucket>();

  get(clientKey: string) {
    return this.buckets.get(clientKey);
  }

  set(clientKey: string, bucket: ClientBucket) {
    this.buckets.set(clientKey, bucket);
  }

  delete(clientKey: string) {
    this.buckets.delete(clientKey);
  }

  entries() {
    return this.buckets.entries();
  }

  get size() {
    return this.buckets.size;
  }
}

export class MemoryOtpStore implements OtpStore {
  private readonly records = new Map<string, OtpRecord>();

  get(key: string) {
    return this.records.get(key);
  }

  put(key: string, record: OtpRecord) {
    this.records.set(key, record);
  }

  delete(key: string) {
    this.records.delete(key);
  }

  get size() {
    return this.records.size;
  }
}

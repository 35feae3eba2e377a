export const CANONICAL_RELATION = "canonical";

export interface JobLink {
  readonly relation: string;
  readonly href: URL;
}

export interface JobIntegrity {
  readonly method: string;
  readonly expectedValueBase64: string;
}

/**
 * One unit of work derived from a single notification. Built once by the
 * ingestion adapter and only read afterwards.
 */
export interface Job {
  readonly id: string;
  readonly topic: string;
  readonly dataId: string;
  readonly links: readonly JobLink[];
  readonly integrity?: JobIntegrity;
  readonly receivedAt: Date;
}

export type LinkStatus =
  | "skipped-existing"
  | "downloaded"
  | "download-failed"
  | "persist-failed";

export interface LinkOutcome {
  href: string;
  path: string;
  status: LinkStatus;
  verification?: VerificationResult;
}

export type SubscriptionMap = Record<string, string>;

export type VerificationResult =
  | {
      status: "skipped";
      reason: "no-integrity" | "unsupported-method";
      method?: string;
    }
  | {
      status: "verified";
      match: boolean;
      algorithm: string;
      expected: string;
      actual: string;
    };

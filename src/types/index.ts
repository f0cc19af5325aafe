export type JobStatus =
  | "Applied"
  | "Phone Screen"
  | "Interview"
  | "Technical"
  | "Offer"
  | "Rejected"
  | "Ghosted";

export interface MailAddress {
  mailbox: string;
  host: string;
  name?: string;
}

export interface MimePart {
  contentType?: string; // raw Content-Type header value
  body: Buffer;
}

export interface Envelope {
  subject: string;
  from: MailAddress[];
  date: Date;
}

export interface RawMessage {
  id: string;
  envelope?: Envelope;
  parts: MimePart[]; // leaf parts, original order
}

export interface CandidateRecord {
  subject: string;
  body: string; // plain text or stripped HTML
  sender: string; // mailbox@host, or "" when unknown
  receivedAt: Date;
}

export interface JobApplication {
  company: string;
  position: string;
  status: JobStatus;
  sourceDate: Date;
  sourceEmail: string; // sender address
  salaryRange?: string;
  location?: string;
  jobLink?: string;
  followUpDate?: string; // ISO date
  notes?: string;
}

export type ParseOutcome =
  | { kind: "parsed"; application: JobApplication }
  | { kind: "empty" };

export type ReconcileOutcome =
  | { ok: true; action: "created" | "updated" }
  | { ok: false; reason: string };

export interface FailureEntry {
  receivedAt: Date;
  sender: string;
  subject: string;
  body: string;
  reason: string;
}

export interface MailboxReader {
  search(since: Date): Promise<string[]>;
  fetch(ids: string[]): AsyncIterable<RawMessage>;
}

export interface SemanticParser {
  parse(candidate: CandidateRecord): Promise<ParseOutcome>;
}

export interface StoreReconciler {
  upsert(application: JobApplication): Promise<ReconcileOutcome>;
}

export interface FailureSink {
  report(entries: readonly FailureEntry[]): Promise<void>;
}

import type {
  CandidateRecord,
  FailureEntry,
  FailureSink,
  JobApplication,
  MailboxReader,
  MimePart,
  ParseOutcome,
  RawMessage,
  ReconcileOutcome,
  SemanticParser,
  StoreReconciler,
} from "../types";

export function textPart(contentType: string, text: string): MimePart {
  return { contentType, body: Buffer.from(text, "utf-8") };
}

export function rawMessage(
  id: string,
  subject: string,
  options: { from?: string; date?: Date; parts?: MimePart[] } = {}
): RawMessage {
  const [mailbox, host] = (options.from ?? "jobs@acme.com").split("@");
  return {
    id,
    envelope: {
      subject,
      from: options.from === "" ? [] : [{ mailbox, host }],
      date: options.date ?? new Date("2024-03-05T14:07:00Z"),
    },
    parts: options.parts ?? [textPart("text/plain; charset=utf-8", `Body of ${id}`)],
  };
}

export class ArrayMailbox implements MailboxReader {
  searchedSince: Date | null = null;
  fetchCalls = 0;

  constructor(
    private readonly messages: RawMessage[],
    private readonly failAfter?: number
  ) {}

  async search(since: Date): Promise<string[]> {
    this.searchedSince = since;
    return this.messages.map((m) => m.id);
  }

  async *fetch(ids: string[]): AsyncIterable<RawMessage> {
    this.fetchCalls++;
    let sent = 0;
    for (const message of this.messages) {
      if (!ids.includes(message.id)) continue;
      if (this.failAfter !== undefined && sent === this.failAfter) {
        throw new Error("connection reset");
      }
      yield message;
      sent++;
    }
  }
}

export function application(
  company: string,
  position: string,
  overrides: Partial<JobApplication> = {}
): JobApplication {
  return {
    company,
    position,
    status: "Applied",
    sourceDate: new Date("2024-03-05T14:07:00Z"),
    sourceEmail: "jobs@acme.com",
    ...overrides,
  };
}

/** Parser whose answer is looked up by subject; unknown subjects parse empty. */
export class StubParser implements SemanticParser {
  readonly seen: CandidateRecord[] = [];

  constructor(
    private readonly answers: Record<string, ParseOutcome | Error>
  ) {}

  async parse(candidate: CandidateRecord): Promise<ParseOutcome> {
    this.seen.push(candidate);
    const answer = this.answers[candidate.subject];
    if (answer instanceof Error) throw answer;
    return answer ?? { kind: "empty" };
  }
}

/** Upserts keyed by company + position, like the real store. */
export class InMemoryStore implements StoreReconciler {
  readonly rows = new Map<string, JobApplication>();
  readonly calls: JobApplication[] = [];

  constructor(private readonly rejectCompanies: string[] = []) {}

  async upsert(app: JobApplication): Promise<ReconcileOutcome> {
    this.calls.push(app);
    if (this.rejectCompanies.includes(app.company)) {
      return { ok: false, reason: `rejected ${app.company}` };
    }
    const key = `${app.company}\u0000${app.position}`;
    const action = this.rows.has(key) ? "updated" : "created";
    this.rows.set(key, app);
    return { ok: true, action };
  }
}

export class RecordingReporter implements FailureSink {
  readonly reports: FailureEntry[][] = [];

  async report(entries: readonly FailureEntry[]): Promise<void> {
    this.reports.push([...entries]);
  }
}

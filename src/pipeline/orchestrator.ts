import type {
  CandidateRecord,
  FailureEntry,
  FailureSink,
  JobApplication,
  MailboxReader,
  ParseOutcome,
  RawMessage,
  SemanticParser,
  StoreReconciler,
} from "../types";
import { extractBody, extractSender } from "../services/extract.service";
import { isJobRelated } from "../services/filter.service";
import { errorMessage, PipelineError, SetupError } from "../utils/errors";
import { logger } from "../utils/logger";
import { Channel } from "./channel";

const log = logger.child("pipeline");

export const EMPTY_PARSE_REASON = "Empty LLM output";

export interface PipelineDeps {
  mailbox: MailboxReader;
  parser: SemanticParser;
  store: StoreReconciler;
  reporter: FailureSink;
  isJobRelated?: (subject: string) => boolean;
}

export interface PipelineOptions {
  since: Date;
  bufferSize?: number;
}

export interface PipelineSummary {
  found: number;
  candidates: number;
  upserted: number;
  failures: FailureEntry[];
}

interface ParsedCandidate {
  candidate: CandidateRecord;
  application: JobApplication;
}

function failureFrom(candidate: CandidateRecord, reason: string): FailureEntry {
  return {
    receivedAt: candidate.receivedAt,
    sender: candidate.sender,
    subject: candidate.subject,
    body: candidate.body,
    reason,
  };
}

// A failed stage keeps reading its input so the stage feeding it can finish.
async function releaseUpstream<T>(input: Channel<T>, stage: string): Promise<void> {
  const dropped = await input.drain();
  if (dropped > 0) {
    log.warn(`${stage} stage failed; dropped ${dropped} unprocessed items`);
  }
}

async function fetchStage(
  mailbox: MailboxReader,
  ids: string[],
  out: Channel<RawMessage>
): Promise<void> {
  try {
    for await (const raw of mailbox.fetch(ids)) {
      await out.send(raw);
    }
  } finally {
    out.close();
  }
}

async function filterStage(
  input: Channel<RawMessage>,
  out: Channel<CandidateRecord>,
  matches: (subject: string) => boolean
): Promise<number> {
  let forwarded = 0;
  try {
    for await (const raw of input) {
      if (!raw.envelope) {
        log.debug(`Skipping ${raw.id}: no envelope`);
        continue;
      }
      if (!matches(raw.envelope.subject)) {
        continue;
      }

      await out.send({
        subject: raw.envelope.subject,
        body: extractBody(raw),
        sender: extractSender(raw),
        receivedAt: raw.envelope.date,
      });
      forwarded++;
    }
  } catch (error) {
    await releaseUpstream(input, "filter");
    throw error;
  } finally {
    out.close();
  }
  return forwarded;
}

async function parseStage(
  input: Channel<CandidateRecord>,
  out: Channel<ParsedCandidate>,
  parser: SemanticParser,
  failures: FailureEntry[]
): Promise<void> {
  try {
    for await (const candidate of input) {
      let outcome: ParseOutcome;
      try {
        outcome = await parser.parse(candidate);
      } catch (error) {
        log.error(`Parser failed on "${candidate.subject}"`, error);
        failures.push(
          failureFrom(candidate, `Parser error: ${errorMessage(error)}`)
        );
        continue;
      }

      if (outcome.kind === "empty") {
        log.warn(`Parser found nothing in "${candidate.subject}"`);
        failures.push(failureFrom(candidate, EMPTY_PARSE_REASON));
        continue;
      }

      log.info(
        `Parsed job: ${outcome.application.company} - ${outcome.application.position} (${outcome.application.status})`
      );
      await out.send({ candidate, application: outcome.application });
    }
  } catch (error) {
    await releaseUpstream(input, "parse");
    throw error;
  } finally {
    out.close();
  }
}

/**
 * Runs one ingestion pass: fetch, filter+extract and parse run as concurrent
 * stages joined by channels, and the caller's task reconciles each parsed
 * record in order. Every candidate that reaches the parser ends in either
 * one upsert or one failure entry; failures are flushed once at the end.
 */
export async function runPipeline(
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<PipelineSummary> {
  let ids: string[];
  try {
    ids = await deps.mailbox.search(options.since);
  } catch (error) {
    throw new SetupError(`Failed to search mailbox: ${errorMessage(error)}`, error);
  }
  log.info(`Found ${ids.length} messages.`);

  const summary: PipelineSummary = {
    found: ids.length,
    candidates: 0,
    upserted: 0,
    failures: [],
  };
  if (ids.length === 0) {
    return summary;
  }

  const bufferSize = options.bufferSize ?? 0;
  const rawChannel = new Channel<RawMessage>(bufferSize);
  const candidateChannel = new Channel<CandidateRecord>(bufferSize);
  const parsedChannel = new Channel<ParsedCandidate>(bufferSize);
  const failures = summary.failures;

  const stages = Promise.allSettled([
    fetchStage(deps.mailbox, ids, rawChannel),
    filterStage(rawChannel, candidateChannel, deps.isJobRelated ?? isJobRelated),
    parseStage(candidateChannel, parsedChannel, deps.parser, failures),
  ]);

  for await (const { candidate, application } of parsedChannel) {
    try {
      const outcome = await deps.store.upsert(application);
      if (outcome.ok) {
        summary.upserted++;
      } else {
        failures.push(failureFrom(candidate, outcome.reason));
      }
    } catch (error) {
      log.error(`Store upsert failed for ${application.company}`, error);
      failures.push(failureFrom(candidate, errorMessage(error)));
    }
  }

  const [fetched, filtered, parsed] = await stages;
  if (filtered.status === "fulfilled") {
    summary.candidates = filtered.value;
  }

  await deps.reporter.report(failures);

  const broken = [fetched, filtered, parsed].find(
    (result): result is PromiseRejectedResult => result.status === "rejected"
  );
  if (broken) {
    throw new PipelineError(
      `Pipeline stopped early: ${errorMessage(broken.reason)}`,
      broken.reason
    );
  }

  return summary;
}

import { Client } from "@notionhq/client";
import { runPipeline, type PipelineSummary } from "./pipeline/orchestrator";
import { FailureReporter } from "./services/failure.service";
import { createSubjectFilter } from "./services/filter.service";
import {
  createGmailMessagesApi,
  GmailMailboxReader,
} from "./services/gmail.service";
import { AnthropicParser, createMessageCreator } from "./services/llm.service";
import { NotionReconciler } from "./services/notion.service";
import { HeuristicParser } from "./services/parser.service";
import type {
  FailureSink,
  MailboxReader,
  SemanticParser,
  StoreReconciler,
} from "./types";
import type { AppConfig } from "./utils/config";
import { SetupError } from "./utils/errors";
import { logger } from "./utils/logger";

export interface TrackerServices {
  mailbox: MailboxReader;
  parser: SemanticParser;
  store: StoreReconciler;
  reporter: FailureSink;
}

export function lookbackStart(now: Date, months: number): Date {
  const since = new Date(now.getTime());
  since.setMonth(since.getMonth() - months);
  return since;
}

function createParser(parserConfig: AppConfig["parser"]): SemanticParser {
  if (parserConfig.provider === "anthropic" && parserConfig.anthropicApiKey) {
    logger.info(`Using Anthropic parser (${parserConfig.model})`);
    return new AnthropicParser(
      createMessageCreator(parserConfig.anthropicApiKey),
      parserConfig.model
    );
  }
  logger.info("Using heuristic parser");
  return new HeuristicParser();
}

/**
 * Build the external collaborators and check the Notion database is usable.
 * Throws SetupError when it is not; nothing has been read from the mailbox yet.
 */
export async function createServices(config: AppConfig): Promise<TrackerServices> {
  const store = new NotionReconciler(
    new Client({ auth: config.notion.token }),
    config.notion.databaseId
  );

  const dbOk = await store.verifyDatabase();
  if (!dbOk) {
    throw new SetupError(
      "Notion database verification failed. Please check your database schema."
    );
  }

  return {
    mailbox: new GmailMailboxReader(
      createGmailMessagesApi(config.gmail),
      config.gmail.label
    ),
    parser: createParser(config.parser),
    store,
    reporter: new FailureReporter(config.pipeline.failureReportPath),
  };
}

export async function processNewEmails(
  services: TrackerServices,
  pipelineConfig: AppConfig["pipeline"],
  now: Date = new Date()
): Promise<PipelineSummary> {
  const since = lookbackStart(now, pipelineConfig.lookbackMonths);
  logger.info(`Processing emails since: ${since.toISOString()}`);

  const summary = await runPipeline(
    {
      ...services,
      isJobRelated: createSubjectFilter(pipelineConfig.subjectKeywords),
    },
    { since, bufferSize: pipelineConfig.bufferSize }
  );

  if (summary.found > 0) {
    logger.info(
      `Run complete: ${summary.found} found, ${summary.candidates} job emails, ${summary.upserted} written, ${summary.failures.length} failed`
    );
  }
  return summary;
}

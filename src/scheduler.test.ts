import { describe, expect, it } from "vitest";
import { lookbackStart, processNewEmails } from "./scheduler";
import {
  application,
  ArrayMailbox,
  InMemoryStore,
  rawMessage,
  RecordingReporter,
  StubParser,
} from "./test-utils/fakes";
import type { AppConfig } from "./utils/config";

const pipelineConfig = (
  overrides: Partial<AppConfig["pipeline"]> = {}
): AppConfig["pipeline"] => ({
  lookbackMonths: 4,
  bufferSize: 0,
  failureReportPath: "unused.csv",
  ...overrides,
});

describe("lookbackStart", () => {
  it("goes back whole calendar months", () => {
    const now = new Date(2024, 6, 15, 10, 30);

    expect(lookbackStart(now, 4)).toEqual(new Date(2024, 2, 15, 10, 30));
    expect(now).toEqual(new Date(2024, 6, 15, 10, 30));
  });
});

describe("processNewEmails", () => {
  it("searches the lookback window and runs the pipeline", async () => {
    const mailbox = new ArrayMailbox([rawMessage("m1", "Application received")]);
    const store = new InMemoryStore();
    const now = new Date(2024, 6, 15, 10, 30);

    const summary = await processNewEmails(
      {
        mailbox,
        parser: new StubParser({
          "Application received": {
            kind: "parsed",
            application: application("Acme", "Engineer"),
          },
        }),
        store,
        reporter: new RecordingReporter(),
      },
      pipelineConfig({ lookbackMonths: 2 }),
      now
    );

    expect(mailbox.searchedSince).toEqual(new Date(2024, 4, 15, 10, 30));
    expect(summary.upserted).toBe(1);
    expect(store.rows.size).toBe(1);
  });

  it("applies configured subject keywords", async () => {
    const parser = new StubParser({});

    const summary = await processNewEmails(
      {
        mailbox: new ArrayMailbox([
          rawMessage("m1", "Application received"),
          rawMessage("m2", "Offer letter"),
        ]),
        parser,
        store: new InMemoryStore(),
        reporter: new RecordingReporter(),
      },
      pipelineConfig({ subjectKeywords: ["offer"] })
    );

    expect(parser.seen.map((c) => c.subject)).toEqual(["Offer letter"]);
    expect(summary.failures).toHaveLength(1);
  });
});

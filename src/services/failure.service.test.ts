import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FailureEntry } from "../types";
import {
  FailureReporter,
  formatTimestamp,
  sanitizeField,
  toCsvRow,
} from "./failure.service";

const entry = (overrides: Partial<FailureEntry> = {}): FailureEntry => ({
  receivedAt: new Date("2024-11-02T09:05:00Z"),
  sender: "no-reply@acme.com",
  subject: "Application update",
  body: "Thanks",
  reason: "Empty LLM output",
  ...overrides,
});

describe("formatTimestamp", () => {
  it("renders YYYY-MM-DD HH:MM in UTC", () => {
    expect(formatTimestamp(new Date("2024-01-09T07:03:59Z"))).toBe("2024-01-09 07:03");
  });
});

describe("sanitizeField", () => {
  it("swaps double quotes for single quotes and flattens line breaks", () => {
    expect(sanitizeField('He said "hi"\r\nthen\nleft\rquietly')).toBe(
      "He said 'hi' then left quietly"
    );
  });
});

describe("toCsvRow", () => {
  it("quotes every field and cleans the subject too", () => {
    expect(toCsvRow(entry({ subject: 'Re: "Engineer"\nrole', body: "a,b" }))).toBe(
      '"2024-11-02 09:05","no-reply@acme.com","Re: \'Engineer\' role","a,b","Empty LLM output"'
    );
  });
});

describe("FailureReporter", () => {
  let tmpDir: string;
  let destination: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "failures-"));
    destination = path.join(tmpDir, "unparsed", "unparsed_emails.csv");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes nothing when there are no failures", async () => {
    await new FailureReporter(destination).report([]);

    expect(fs.existsSync(path.dirname(destination))).toBe(false);
  });

  it("creates the directory and writes the header plus one row per entry", async () => {
    await new FailureReporter(destination).report([
      entry(),
      entry({ sender: "", reason: "Notion error: timeout" }),
    ]);

    expect(fs.readFileSync(destination, "utf-8")).toBe(
      [
        "Date,Email,Subject,Body,Reason",
        '"2024-11-02 09:05","no-reply@acme.com","Application update","Thanks","Empty LLM output"',
        '"2024-11-02 09:05","","Application update","Thanks","Notion error: timeout"',
        "",
      ].join("\n")
    );
  });

  it("overwrites the previous run's file", async () => {
    const reporter = new FailureReporter(destination);
    await reporter.report([entry({ subject: "first" }), entry({ subject: "second" })]);
    await reporter.report([entry({ subject: "third" })]);

    const lines = fs.readFileSync(destination, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[1]).toContain('"third"');
  });

  it("logs and carries on when the destination cannot be created", async () => {
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "not a directory");

    await expect(
      new FailureReporter(path.join(blocker, "out.csv")).report([entry()])
    ).resolves.toBeUndefined();
  });
});

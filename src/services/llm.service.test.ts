import type Anthropic from "@anthropic-ai/sdk";
import { describe, expect, it } from "vitest";
import type { CandidateRecord } from "../types";
import {
  AnthropicParser,
  buildUserPrompt,
  normalizeStatus,
  SYSTEM_PROMPT,
  type MessageCreator,
} from "./llm.service";

class FakeMessages implements MessageCreator {
  readonly requests: Anthropic.MessageCreateParamsNonStreaming[] = [];

  constructor(private readonly reply: string | Error) {}

  async create(body: Anthropic.MessageCreateParamsNonStreaming) {
    this.requests.push(body);
    if (this.reply instanceof Error) throw this.reply;
    return { content: [{ type: "text", text: this.reply }] };
  }
}

const candidate: CandidateRecord = {
  subject: "Thanks for applying to Acme",
  body: "We received your application for Engineer.",
  sender: "jobs@acme.com",
  receivedAt: new Date("2024-03-05T14:07:00Z"),
};

describe("normalizeStatus", () => {
  it.each([
    [null, "Applied"],
    ["applied", "Applied"],
    ["Phone Screen", "Phone Screen"],
    ["Technical interview", "Technical"],
    ["Interview", "Interview"],
    ["Offer", "Offer"],
    ["Declined", "Rejected"],
    ["something else", "Applied"],
  ])("maps %j to %s", (input, expected) => {
    expect(normalizeStatus(input)).toBe(expected);
  });
});

describe("buildUserPrompt", () => {
  it("caps the body at 3000 characters", () => {
    const prompt = buildUserPrompt({ ...candidate, body: "x".repeat(5000), sender: "" });

    expect(prompt).toContain("From: unknown\n");
    expect(prompt).toContain(`\n${"x".repeat(3000)}\n`);
    expect(prompt).not.toContain("x".repeat(3001));
  });
});

describe("AnthropicParser", () => {
  it("returns the extracted record", async () => {
    const messages = new FakeMessages(
      'Here you go: {"company": "Acme", "position": "Engineer", "status": "Applied"}'
    );
    const parser = new AnthropicParser(messages, "test-model");

    const outcome = await parser.parse(candidate);

    expect(outcome).toEqual({
      kind: "parsed",
      application: {
        company: "Acme",
        position: "Engineer",
        status: "Applied",
        sourceDate: candidate.receivedAt,
        sourceEmail: "jobs@acme.com",
      },
    });
    expect(messages.requests[0]).toMatchObject({
      model: "test-model",
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildUserPrompt(candidate) }],
    });
  });

  it("keeps a record with only a position", async () => {
    const parser = new AnthropicParser(
      new FakeMessages('{"company": null, "position": "Engineer", "status": "interview"}'),
      "test-model"
    );

    expect(await parser.parse(candidate)).toMatchObject({
      kind: "parsed",
      application: { company: "", position: "Engineer", status: "Interview" },
    });
  });

  it.each([
    ["blank fields", '{"company": " ", "position": null, "status": null}'],
    ["no JSON", "I could not find anything."],
    ["broken JSON", '{"company": "Acme",'],
    ["wrong shape", '{"company": 42}'],
  ])("returns empty for %s", async (_label, reply) => {
    const parser = new AnthropicParser(new FakeMessages(reply), "test-model");

    expect(await parser.parse(candidate)).toEqual({ kind: "empty" });
  });

  it("lets API errors propagate", async () => {
    const parser = new AnthropicParser(
      new FakeMessages(new Error("overloaded")),
      "test-model"
    );

    await expect(parser.parse(candidate)).rejects.toThrow("overloaded");
  });
});

import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import type {
  CandidateRecord,
  JobStatus,
  ParseOutcome,
  SemanticParser,
} from "../types";
import { logger } from "../utils/logger";

const log = logger.child("llm-parser");

const MAX_BODY_CHARS = 3000;

export const SYSTEM_PROMPT = `You extract job application details from emails. Return ONLY strict JSON. No markdown, no commentary.

JSON schema:
{
  "company": string|null,
  "position": string|null,
  "status": "Applied"|"Phone Screen"|"Interview"|"Technical"|"Offer"|"Rejected"|null
}

Use null when the email does not say. Do not guess a company from the sender's mail provider.`;

export function buildUserPrompt(candidate: CandidateRecord): string {
  return `Subject: ${candidate.subject}
From: ${candidate.sender || "unknown"}
Date: ${candidate.receivedAt.toISOString()}

${candidate.body.slice(0, MAX_BODY_CHARS)}

Return ONLY the JSON object.`;
}

const extractionSchema = z.object({
  company: z.string().nullish(),
  position: z.string().nullish(),
  status: z.string().nullish(),
});

/** The part of the Anthropic client the parser calls. */
export interface MessageCreator {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming
  ): Promise<{ content: Array<{ type: string; text?: string }> }>;
}

export function createMessageCreator(apiKey: string): MessageCreator {
  return new Anthropic({ apiKey }).messages;
}

const STATUS_KEYWORDS: [RegExp, JobStatus][] = [
  [/offer/i, "Offer"],
  [/reject|declin|not moving forward/i, "Rejected"],
  [/phone/i, "Phone Screen"],
  [/technical|assessment|challenge/i, "Technical"],
  [/interview/i, "Interview"],
  [/ghost/i, "Ghosted"],
];

export function normalizeStatus(text: string | null | undefined): JobStatus {
  if (!text) return "Applied";
  const hit = STATUS_KEYWORDS.find(([pattern]) => pattern.test(text));
  return hit ? hit[1] : "Applied";
}

export class AnthropicParser implements SemanticParser {
  constructor(
    private readonly messages: MessageCreator,
    private readonly model: string
  ) {}

  async parse(candidate: CandidateRecord): Promise<ParseOutcome> {
    const response = await this.messages.create({
      model: this.model,
      max_tokens: 300,
      temperature: 0,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildUserPrompt(candidate) }],
    });

    const text = response.content
      .map((block) => (block.type === "text" ? block.text ?? "" : ""))
      .join("");

    const jsonMatch = text.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      log.warn(`No JSON in model output for "${candidate.subject}"`);
      return { kind: "empty" };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(jsonMatch[0]);
    } catch (error) {
      log.warn(`Unparsable JSON for "${candidate.subject}"`, error);
      return { kind: "empty" };
    }

    const parsed = extractionSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`Unexpected JSON shape for "${candidate.subject}"`, parsed.error.issues);
      return { kind: "empty" };
    }

    const company = parsed.data.company?.trim() ?? "";
    const position = parsed.data.position?.trim() ?? "";
    if (!company && !position) {
      return { kind: "empty" };
    }

    return {
      kind: "parsed",
      application: {
        company,
        position,
        status: normalizeStatus(parsed.data.status),
        sourceDate: candidate.receivedAt,
        sourceEmail: candidate.sender,
      },
    };
  }
}

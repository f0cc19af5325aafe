import { Client, isFullPage } from "@notionhq/client";
import type {
  JobApplication,
  JobStatus,
  ReconcileOutcome,
  StoreReconciler,
} from "../types";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

const log = logger.child("notion");

export const REQUIRED_PROPERTIES = [
  "Company",
  "Position",
  "Date Applied",
  "Status",
  "Source Email",
];

// Rejected is terminal; Ghosted sits outside the ladder and never blocks a change.
const STATUS_ORDER: JobStatus[] = [
  "Applied",
  "Phone Screen",
  "Interview",
  "Technical",
  "Offer",
  "Rejected",
];

export function shouldAdvanceStatus(
  current: string | null,
  next: JobStatus
): boolean {
  const from = STATUS_ORDER.findIndex((status) => status === current);
  const to = STATUS_ORDER.indexOf(next);
  if (from === -1 || to === -1) return true;
  return to >= from;
}

type RichText = Array<{ text: { content: string } }>;

type PropertyValue =
  | { title: RichText }
  | { rich_text: RichText }
  | { date: { start: string } }
  | { select: { name: string } }
  | { url: string };

type PageProperties = Record<string, PropertyValue>;

// Notion caps rich text content at 2000 characters; blank values stay empty.
const text = (content: string): RichText =>
  content ? [{ text: { content: content.slice(0, 2000) } }] : [];

function buildProperties(app: JobApplication): PageProperties {
  const properties: PageProperties = {
    Company: { title: text(app.company) },
    Position: { rich_text: text(app.position) },
    "Date Applied": {
      date: { start: app.sourceDate.toISOString().split("T")[0] },
    },
    Status: { select: { name: app.status } },
    "Source Email": { rich_text: text(app.sourceEmail) },
  };

  if (app.salaryRange) properties["Salary Range"] = { rich_text: text(app.salaryRange) };
  if (app.location) properties["Location"] = { rich_text: text(app.location) };
  if (app.jobLink) properties["Job Link"] = { url: app.jobLink };
  if (app.followUpDate) properties["Follow-up Date"] = { date: { start: app.followUpDate } };
  if (app.notes) properties["Notes"] = { rich_text: text(app.notes) };

  return properties;
}

// Updates keep the original Date Applied and only move the status forward.
function buildUpdateProperties(
  app: JobApplication,
  currentStatus: string | null
): PageProperties {
  const properties: PageProperties = {
    "Source Email": { rich_text: text(app.sourceEmail) },
  };

  if (shouldAdvanceStatus(currentStatus, app.status)) {
    properties.Status = { select: { name: app.status } };
  }
  if (app.salaryRange) properties["Salary Range"] = { rich_text: text(app.salaryRange) };
  if (app.location) properties["Location"] = { rich_text: text(app.location) };
  if (app.followUpDate) properties["Follow-up Date"] = { date: { start: app.followUpDate } };
  if (app.notes) properties["Notes"] = { rich_text: text(app.notes) };

  return properties;
}

export class NotionReconciler implements StoreReconciler {
  constructor(
    private readonly notion: Client,
    private readonly databaseId: string
  ) {}

  async upsert(app: JobApplication): Promise<ReconcileOutcome> {
    try {
      const existing = await this.findExisting(app.company, app.position);

      if (existing) {
        await this.notion.pages.update({
          page_id: existing.id,
          properties: buildUpdateProperties(app, existing.status),
        });
        log.info(`Updated Notion entry: ${app.company} - ${app.position} → ${app.status}`);
        return { ok: true, action: "updated" };
      }

      await this.notion.pages.create({
        parent: { database_id: this.databaseId },
        properties: buildProperties(app),
      });
      log.info(`Created Notion entry: ${app.company} - ${app.position}`);
      return { ok: true, action: "created" };
    } catch (error) {
      log.error(`Failed to write Notion entry for ${app.company}`, error);
      return { ok: false, reason: `Notion error: ${errorMessage(error)}` };
    }
  }

  /**
   * Verify the database exists and has the properties the tracker writes.
   */
  async verifyDatabase(): Promise<boolean> {
    try {
      const db = await this.notion.databases.retrieve({
        database_id: this.databaseId,
      });

      const properties = Object.keys(db.properties);
      const missing = REQUIRED_PROPERTIES.filter((r) => !properties.includes(r));

      if (missing.length > 0) {
        log.error(`Notion database is missing properties: ${missing.join(", ")}`);
        log.info(
          "Required properties: Company (Title), Position (Text), Date Applied (Date), Status (Select), Source Email (Text). Optional: Salary Range (Text), Location (Text), Job Link (URL), Follow-up Date (Date), Notes (Text)"
        );
        return false;
      }

      log.info("Notion database verified successfully");
      return true;
    } catch (error) {
      log.error("Failed to verify Notion database", error);
      return false;
    }
  }

  private async findExisting(
    company: string,
    position: string
  ): Promise<{ id: string; status: string | null } | null> {
    const response = await this.notion.databases.query({
      database_id: this.databaseId,
      filter: {
        and: [
          {
            property: "Company",
            title: company ? { equals: company } : { is_empty: true },
          },
          {
            property: "Position",
            rich_text: position ? { equals: position } : { is_empty: true },
          },
        ],
      },
      page_size: 1,
    });

    const page = response.results[0];
    if (!page) return null;
    if (!isFullPage(page)) return { id: page.id, status: null };

    const status = page.properties.Status;
    return {
      id: page.id,
      status: status?.type === "select" ? status.select?.name ?? null : null,
    };
  }
}

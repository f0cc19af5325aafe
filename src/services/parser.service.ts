import type {
  CandidateRecord,
  JobApplication,
  JobStatus,
  ParseOutcome,
  SemanticParser,
} from "../types";
import { logger } from "../utils/logger";

const log = logger.child("heuristic-parser");

export type EmailCategory =
  | "application_confirmation"
  | "rejection"
  | "interview_invitation"
  | "offer"
  | "follow_up"
  | "unknown";

// Checked in order; the first category with a matching pattern wins.
const CATEGORY_PATTERNS: { category: EmailCategory; patterns: RegExp[] }[] = [
  {
    category: "offer",
    patterns: [
      /offer letter/i,
      /job offer/i,
      /pleased to offer/i,
      /extend an offer/i,
      /offer of employment/i,
    ],
  },
  {
    category: "interview_invitation",
    patterns: [
      /schedule.*interview/i,
      /interview.*schedule/i,
      /phone screen/i,
      /invite you to (?:an )?interview/i,
      /technical assessment/i,
      /coding challenge/i,
      /take-home/i,
    ],
  },
  {
    category: "rejection",
    patterns: [
      /unfortunately/i,
      /not moving forward/i,
      /other candidates/i,
      /position has been filled/i,
      /decided not to proceed/i,
      /regret to inform/i,
    ],
  },
  {
    category: "application_confirmation",
    patterns: [
      /application.*received/i,
      /thank(?:s| you) for applying/i,
      /application.*submitted/i,
      /received your application/i,
      /successfully applied/i,
    ],
  },
  {
    category: "follow_up",
    patterns: [
      /following up/i,
      /checking in/i,
      /update on your application/i,
      /status.*application/i,
    ],
  },
];

const STATUS_BY_CATEGORY: Record<EmailCategory, JobStatus> = {
  application_confirmation: "Applied",
  rejection: "Rejected",
  interview_invitation: "Interview",
  offer: "Offer",
  follow_up: "Applied",
  unknown: "Applied",
};

const FOLLOW_UP_DAYS: Partial<Record<EmailCategory, number>> = {
  application_confirmation: 7,
  interview_invitation: 1,
};

export function classifyEmail(subject: string, body: string): EmailCategory {
  const text = `${subject} ${body}`;
  const hit = CATEGORY_PATTERNS.find(({ patterns }) =>
    patterns.some((p) => p.test(text))
  );
  return hit?.category ?? "unknown";
}

// Applicant tracking systems send on behalf of the employer, so their
// domain never names the company.
const ATS_DOMAINS = [
  "greenhouse",
  "lever",
  "workday",
  "myworkdayjobs",
  "icims",
  "smartrecruiters",
  "ashbyhq",
  "jobvite",
  "bamboohr",
  "recruitee",
  "rippling",
];

const MAIL_PROVIDERS = ["gmail", "yahoo", "hotmail", "outlook", "icloud", "proton"];

const NAME = "([A-Z][A-Za-z0-9\\s&.,'-]+?)";

const COMPANY_IN_BODY = [
  new RegExp(`application\\s+(?:to|at|with)\\s+(?:the\\s+)?${NAME}(?:\\s+(?:has been|was|is|for)\\b)`, "i"),
  new RegExp(`(?:applying|applied)\\s+(?:to|at|with)\\s+(?:the\\s+)?${NAME}(?:\\s*[.!,]|\\s+(?:for|and|as)\\b)`, "i"),
  new RegExp(`interest\\s+in\\s+(?:working\\s+(?:at|with)\\s+)?${NAME}(?:\\s*[.!,]|\\s+(?:and|we)\\b)`, "i"),
  new RegExp(`(?:position|role|opportunity)\\s+(?:at|with)\\s+${NAME}(?:\\s*[.!,]|\\s+(?:and|has|is|we)\\b)`, "i"),
  new RegExp(`team\\s+at\\s+${NAME}(?:\\s*[.!,])`, "i"),
];

const COMPANY_IN_SUBJECT = [
  new RegExp(`\\b(?:at|from|with|to)\\s+${NAME}(?:\\s*[-–|!]|\\s*$)`),
  new RegExp(`^${NAME}\\s*[-–|:]\\s`),
];

const TITLE = "([A-Za-z0-9\\s/,.-]+?)";

const POSITION_IN_BODY = [
  new RegExp(`for\\s+the\\s+${TITLE}\\s+(?:position|role|opening)`, "i"),
  new RegExp(`(?:position|role|job\\s*title)\\s*[:–-]\\s*${TITLE}(?:\\s*[.\\n,;]|\\s+(?:at|with|in|is)\\b)`, "i"),
  new RegExp(`application\\s+for\\s+(?:the\\s+)?${TITLE}(?:\\s+(?:position|role|at|with|has)\\b|\\s*[.,;])`, "i"),
  new RegExp(`the\\s+${TITLE}\\s+(?:role|position|opening)\\s+(?:at|with)\\b`, "i"),
];

const POSITION_IN_SUBJECT = [
  new RegExp(`application\\s*[-–:]\\s*${TITLE}(?:\\s+(?:at|with|-)\\b|\\s*$)`, "i"),
  new RegExp(`application\\s+for\\s+(?:the\\s+)?${TITLE}(?:\\s+(?:at|with)\\b|\\s*$)`, "i"),
  new RegExp(`(?:role|position|job)\\s*[-–:]\\s*([A-Za-z0-9\\s/,.-]+)`, "i"),
];

const JOB_TITLE_WORDS =
  /\b(developer|engineer|designer|analyst|manager|director|coordinator|specialist|consultant|administrator|architect|lead|intern|associate|assistant|scientist|devops|sre|product|marketing|sales|operations)\b/i;

const NOT_A_POSITION =
  /^(thank you|thanks|application|confirmation|update|status|your interest|the team|dear|hi|hello|re|fwd)\b/i;

const NOT_A_COMPANY = new Set([
  "the", "a", "an", "your", "our", "us", "we", "thank", "thanks", "hi",
  "hello", "dear", "application", "confirmation", "update", "status",
]);

function cleanCompanyName(name: string): string | null {
  const cleaned = name
    .replace(/\s+(recruiting|careers|talent|team|hr|jobs|hiring)\s*$/i, "")
    .replace(/,?\s*(Inc\.?|LLC|Ltd\.?|Corp\.?)\s*$/i, "")
    .replace(/\s+/g, " ")
    .trim();

  if (cleaned.length < 2 || cleaned.length >= 80) return null;
  if (NOT_A_COMPANY.has(cleaned.toLowerCase())) return null;
  return cleaned;
}

function isValidPosition(text: string): boolean {
  if (text.length < 3 || text.length > 100) return false;
  if (NOT_A_POSITION.test(text)) return false;
  return JOB_TITLE_WORDS.test(text) || text.split(/\s+/).length >= 2;
}

function firstMatch(
  text: string,
  patterns: RegExp[],
  accept: (candidate: string) => string | null
): string | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    const accepted = match ? accept(match[1]) : null;
    if (accepted) return accepted;
  }
  return null;
}

function companyFromDomain(sender: string): string | null {
  const domain = sender.match(/@(?:[\w-]+\.)*?([\w-]+)\.[a-z]{2,}$/i)?.[1];
  if (!domain) return null;

  const lower = domain.toLowerCase();
  if (MAIL_PROVIDERS.includes(lower) || ATS_DOMAINS.includes(lower)) return null;
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

export function extractCompany(candidate: CandidateRecord, body: string): string | null {
  return (
    firstMatch(body, COMPANY_IN_BODY, cleanCompanyName) ??
    firstMatch(candidate.subject, COMPANY_IN_SUBJECT, cleanCompanyName) ??
    companyFromDomain(candidate.sender)
  );
}

export function extractPosition(candidate: CandidateRecord, body: string): string | null {
  const accept = (text: string) => {
    const trimmed = text.trim();
    return isValidPosition(trimmed) ? trimmed : null;
  };
  return (
    firstMatch(body, POSITION_IN_BODY, accept) ??
    firstMatch(candidate.subject, POSITION_IN_SUBJECT, accept)
  );
}

function extractSalary(text: string): string | undefined {
  return text.match(/\$[\d,]+\s*(?:k|K)?\s*(?:-|–|to)\s*\$[\d,]+\s*(?:k|K)?/)?.[0].trim();
}

function extractLocation(text: string): string | undefined {
  const labeled = text.match(/(?:location|based in|located in):?\s*([A-Za-z\s]+(?:,\s*[A-Z]{2})?)(?:[.,\n])/i);
  if (labeled) return labeled[1].trim();
  return text.match(/\b(remote|hybrid|on-?site)\b/i)?.[1];
}

function extractJobLink(text: string): string | undefined {
  return text.match(
    /https?:\/\/[\w.-]+(?:\/[\w\-./?%&=#]*)?(?:job|career|position|apply|opening)[\w\-./?%&=#]*/i
  )?.[0];
}

function addDays(date: Date, days: number): string {
  const next = new Date(date.getTime());
  next.setUTCDate(next.getUTCDate() + days);
  return next.toISOString().split("T")[0];
}

/**
 * Offline parser built on subject and body patterns. Used when no LLM key is
 * configured; weaker than the LLM on free-form mail.
 */
export class HeuristicParser implements SemanticParser {
  async parse(candidate: CandidateRecord): Promise<ParseOutcome> {
    const body = candidate.body.slice(0, 3000);
    const company = extractCompany(candidate, body);
    const position = extractPosition(candidate, body);

    if (!company && !position) {
      log.debug(`No company or position in "${candidate.subject}"`);
      return { kind: "empty" };
    }

    const category = classifyEmail(candidate.subject, body);
    const followUpDays = FOLLOW_UP_DAYS[category];

    const application: JobApplication = {
      company: company ?? "Unknown Company",
      position: position ?? "Unknown Position",
      status: STATUS_BY_CATEGORY[category],
      sourceDate: candidate.receivedAt,
      sourceEmail: candidate.sender,
      salaryRange: extractSalary(body),
      location: extractLocation(body),
      jobLink: extractJobLink(body),
      followUpDate:
        followUpDays === undefined
          ? undefined
          : addDays(candidate.receivedAt, followUpDays),
      notes: `Auto-tracked from email: ${category.replace(/_/g, " ")}`,
    };
    return { kind: "parsed", application };
  }
}

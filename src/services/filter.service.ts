// Subject keywords that mark a message as job-application mail.
// Changing this list changes what gets tracked; keep it stable.
export const DEFAULT_KEYWORDS: readonly string[] = [
  "applied",
  "application",
  "thanks for applying",
  "thanks from",
  "follow-up",
  "update",
  "recruiting",
  "thank you for applying",
];

export function isJobRelated(
  subject: string,
  keywords: readonly string[] = DEFAULT_KEYWORDS
): boolean {
  const lower = subject.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}

export function createSubjectFilter(
  keywords: readonly string[] = DEFAULT_KEYWORDS
): (subject: string) => boolean {
  const normalized = keywords
    .map((keyword) => keyword.trim().toLowerCase())
    .filter(Boolean);
  return (subject) => isJobRelated(subject, normalized);
}

export const RELEASE_SUMMARY_SYSTEM_PROMPT = `You summarize software release notes for a team chat channel.

Rules:
- Reply with 3 to 6 short bullet points, each starting with "• ".
- Lead with breaking changes and security fixes when there are any, and mark them as such.
- Then list new features, then notable bug fixes.
- Skip contributor lists, dependency bumps and CI changes unless they matter to users.
- Do not invent changes that are not in the notes. If the notes are empty or say nothing useful, reply with a single bullet saying so.
- Plain text only: no headings, no Markdown tables, no links.`;

export function buildUserMessage(
  repository: string,
  version: string,
  releaseNote: string,
): string {
  const notes = releaseNote.trim() === "" ? "(no release notes provided)" : releaseNote;

  return `Repository: ${repository}
Version: ${version}

Release notes:
${notes}

Summarize the release notes above.`;
}

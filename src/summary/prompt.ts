import type { ActivityReport } from "../activity/model.js";

export const SUMMARY_SYSTEM_PROMPT = `You write the daily development digest for a software team's chat channel.

You receive the pull requests and commits recorded for one repository during a trailing time window.

Rules:
- Group the findings by developer. Start each group with the developer's handle in bold (*@handle*).
- Under each developer, write short bullet points ("• ") describing what they worked on. Merge related commits and pull requests into one bullet.
- Change sizes, when given as +added/-removed lines and a file count, tell you how large a piece of work is. Put the larger changes first within each developer.
- Mention pull request numbers as #123 and the state when it matters (opened, merged, closed).
- Use Slack mrkdwn only: *bold*, _italic_, \`code\`. No headings, no tables, no HTML.
- Leave out boilerplate: merge commits, version bumps, formatting-only changes and bot noise, unless they are the only activity.
- Do not invent work that is not in the data. Do not add a greeting, a title or a closing remark.`;

function shortTimestamp(iso: string): string {
  return iso.slice(0, 16).replace("T", " ");
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

// "+120/-30, 4 files" when the detail lookup succeeded
function sizeNotes(additions?: number, deletions?: number, files?: number): string[] {
  const notes: string[] = [];
  if (additions !== undefined && deletions !== undefined) notes.push(`+${additions}/-${deletions}`);
  if (files !== undefined) notes.push(plural(files, "file"));
  return notes;
}

/** Renders every record of the report into the user message for the model. */
export function buildActivityPrompt(report: ActivityReport): string {
  const { window } = report;
  const parts: string[] = [
    `Summarize the activity in *${report.repository}* from ${window.start.toISOString()} to ${window.end.toISOString()} (last ${window.hours} hours).\n`,
  ];

  if (report.pullRequests.length > 0) {
    parts.push(`## Pull requests (${report.pullRequests.length})`);
    for (const pr of report.pullRequests) {
      const draft = pr.draft ? " [draft]" : "";
      const notes = [
        `@${pr.author}`,
        `${pr.headBranch} → ${pr.baseBranch}`,
        `created ${shortTimestamp(pr.createdAt)}`,
        `updated ${shortTimestamp(pr.updatedAt)}`,
        ...sizeNotes(pr.additions, pr.deletions, pr.changedFiles),
      ];
      if (pr.commitCount !== undefined) notes.push(plural(pr.commitCount, "commit"));
      parts.push(`- #${pr.number} [${pr.state}]${draft} ${pr.title} (${notes.join(", ")})`);
    }
    parts.push("");
  } else {
    parts.push("## Pull requests\n_None._\n");
  }

  if (report.commits.length > 0) {
    parts.push(`## Commits on ${report.defaultBranch} (${report.commits.length})`);
    for (const c of report.commits) {
      const notes = [
        `@${c.author}`,
        shortTimestamp(c.timestamp),
        ...sizeNotes(c.additions, c.deletions, c.filesChanged),
      ];
      parts.push(`- ${c.shortSha} ${c.message} (${notes.join(", ")})`);
    }
    parts.push("");
  } else {
    parts.push(`## Commits on ${report.defaultBranch}\n_None._\n`);
  }

  return parts.join("\n");
}

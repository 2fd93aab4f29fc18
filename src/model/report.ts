import {
  commentAt,
  hasComment,
  listThreads,
  liveContent,
  netTagScores,
  type Detailed,
} from "./detailed";
import type { MessageId } from "../types/brands";

const label = ([author, local]: MessageId) => `${author} [${local}]`;

/**
 * Plain-text dump of a view for debugging: each titled thread with its
 * positively scored tags, then its reply tree depth-first via backrefs.
 */
export const renderReport = (view: Detailed): string[] => {
  const lines: string[] = [];

  for (const [id, thread] of listThreads(view)) {
    if (thread.titles.value.length === 0) continue;
    lines.push(`Thread: ${label(id)}`);
    for (const title of thread.titles.value) lines.push(`Title: ${title}`);
    const tags = netTagScores(thread)
      .filter(([, score]) => score > 0)
      .map(([tag, score]) => `${tag} (${score})`);
    lines.push(tags.length ? `Tags: ${tags.join(", ")}` : "Tags:");

    const seen = new Set<string>();
    const stack: [number, MessageId][] = [[0, id]];
    while (stack.length) {
      const top = stack.pop();
      if (!top) break;
      const [depth, at] = top;
      const key = label(at);
      if (seen.has(key)) continue;
      seen.add(key);

      const indent = "  ".repeat(depth);
      if (!hasComment(view, at)) {
        lines.push(`${indent}${depth} ${key} (missing)`);
        continue;
      }
      const comment = commentAt(view, at);
      lines.push(`${indent}${depth} ${key}`);
      for (const [version, body] of liveContent(comment)) lines.push(`${indent}  [${version}] ${body}`);
      // reversed so the lowest backref is printed first
      for (const child of [...comment.backrefs].reverse()) stack.push([depth + 1, child]);
    }
    lines.push("");
  }
  return lines;
};

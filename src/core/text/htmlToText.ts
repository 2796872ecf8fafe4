import { load } from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";

const collectText = (node: AnyNode, lines: string[]) => {
  if (isText(node)) {
    const line = node.data.trim();
    if (line.length > 0) lines.push(line);
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, lines);
  }
};

/**
 * Plain-text form of an HTML fragment: every text node on its own line,
 * trimmed, with blank nodes dropped. Entities are decoded by the parser;
 * script and style bodies and comments never reach the output.
 */
export const htmlToText = (html: string): string => {
  const $ = load(html, null, false);
  $("script, style, noscript").remove();

  const lines: string[] = [];
  for (const root of $.root().toArray()) collectText(root, lines);
  return lines.join("\n");
};

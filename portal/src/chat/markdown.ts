const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

const FRAGMENT_PATTERN = /\u0000(\d+)\u0000/g;
const UNORDERED_ITEM = /^[-*+]\s+/;
const ORDERED_ITEM = /^\d+[.)]\s+/;
const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * `http:`, `https:`, `mailto:` and scheme-less targets. Browsers drop
 * control characters from URLs before reading the scheme, so any target
 * carrying one is refused outright.
 */
export function isSafeHref(href: string): boolean {
  if (CONTROL_CHARACTER.test(href)) {
    return false;
  }
  if (/^(?:https?:|mailto:)/i.test(href)) {
    return true;
  }
  return !/^[a-z][a-z0-9+.-]*:/i.test(href);
}

/**
 * Renders the small Markdown subset assistant replies use into HTML.
 *
 * Everything is escaped first. Code is then set aside as numbered
 * placeholders so that the inline rules never reach into it, and the
 * placeholders are swapped back after the block structure is built.
 */
export function renderMarkdown(text: string): string {
  const fragments: string[] = [];
  const stash = (html: string): string => {
    fragments.push(html);
    return `\u0000${fragments.length - 1}\u0000`;
  };

  let html = escapeHtml(text.replace(/\u0000/g, "").replace(/\r\n?/g, "\n"));

  html = html.replace(
    /```(?:([\w+-]+)?[^\S\n]*\n)?([\s\S]*?)```/g,
    (_match, language: string | undefined, code: string) =>
      `\n\n${stash(renderCodeBlock(language, code))}\n\n`,
  );
  html = html.replace(/`([^`\n]+)`/g, (_match, code: string) =>
    stash(`<code>${code}</code>`),
  );
  html = html.replace(/\*\*(?!\s)([^*\n]+?)(?<!\s)\*\*/g, "<strong>$1</strong>");
  html = html.replace(/\*(?!\s)([^*\n]+?)(?<!\s)\*/g, "<em>$1</em>");
  html = html.replace(
    /\[([^\]\n]+)\]\(([^)\s]+)\)/g,
    (match, label: string, href: string) =>
      isSafeHref(href)
        ? `<a href="${href}" target="_blank" rel="noopener">${label}</a>`
        : match,
  );

  const blocks = html
    .split(/\n{2,}/)
    .map((block) => block.trim())
    .filter((block) => block.length > 0)
    .map(renderBlock)
    .join("");

  return blocks.replace(
    FRAGMENT_PATTERN,
    (_match, index: string) => fragments[Number(index)] ?? "",
  );
}

function renderCodeBlock(language: string | undefined, code: string): string {
  const body = code.replace(/^\n+|\n+$/g, "");
  const attribute = language ? ` class="language-${language}"` : "";
  return `<pre><code${attribute}>${body}</code></pre>`;
}

function renderBlock(block: string): string {
  if (/^\u0000\d+\u0000$/.test(block)) {
    return block;
  }

  const lines = block.split("\n").map((line) => line.trim());
  const first = lines[0] ?? "";
  const marker = UNORDERED_ITEM.test(first)
    ? UNORDERED_ITEM
    : ORDERED_ITEM.test(first)
      ? ORDERED_ITEM
      : null;

  if (!marker) {
    return `<p>${lines.join("<br>")}</p>`;
  }

  const items: string[] = [];
  for (const line of lines) {
    if (marker.test(line)) {
      items.push(line.replace(marker, ""));
    } else if (items.length > 0) {
      items[items.length - 1] += `<br>${line}`;
    }
  }
  const tag = marker === UNORDERED_ITEM ? "ul" : "ol";
  return `<${tag}>${items.map((item) => `<li>${item}</li>`).join("")}</${tag}>`;
}

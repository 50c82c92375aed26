/**
 * Markdown to HTML conversion for site pages
 *
 * Two kinds of links are rewritten on the way:
 * - links to other Markdown documents point at the generated `.html` page
 * - links to audio files become an inline `<audio>` player
 */

import { Marked, type Token, type Tokens } from "marked";
import { getAudioMimeType } from "./media.js";

const MARKDOWN_SUFFIX = ".md";
const HTML_SUFFIX = ".html";

/** Label used for an audio link that has no leading text */
export const AUDIO_LABEL_PLACEHOLDER = "#";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch]);
}

/**
 * Point a link at the generated page when it targets a Markdown file.
 * The match is a literal end-of-string check, so `a.md#part` is left alone.
 *
 * @example
 * rewriteMarkdownHref('guide/setup.md') // 'guide/setup.html'
 * rewriteMarkdownHref('guide/setup.md#install') // 'guide/setup.md#install'
 */
export function rewriteMarkdownHref(href: string): string {
  return href.endsWith(MARKDOWN_SUFFIX) ? href.slice(0, -MARKDOWN_SUFFIX.length) + HTML_SUFFIX : href;
}

type LabelState = "inLink" | "awaitingClose" | "done";

function isLink(token: Token): token is Tokens.Link {
  return token.type === "link";
}

function isText(token: Token): token is Tokens.Text {
  return token.type === "text";
}

/**
 * Find the token that labels an audio link among the link's children.
 *
 * Starts right after the link opens and pulls at most two children: the
 * text, then whatever closes the span. Returns null when the link does not
 * start with text.
 */
export function readAudioLabel(children: Iterable<Token>): Tokens.Text | null {
  const iterator = children[Symbol.iterator]();
  let state: LabelState = "inLink";
  let label: Tokens.Text | null = null;

  while (state !== "done") {
    const next = iterator.next();
    switch (state) {
      case "inLink":
        if (!next.done && isText(next.value)) {
          label = next.value;
          state = "awaitingClose";
        } else {
          state = "done";
        }
        break;
      case "awaitingClose":
        // the player replaces the whole span, remaining children are dropped
        state = "done";
        break;
    }
  }
  return label;
}

/**
 * Build the inline player that replaces an audio link.
 *
 * @param href - Link target
 * @param title - Link title attribute, if any
 * @param labelHtml - Rendered label for the fallback play link
 * @param mimeType - MIME type of the audio file
 */
export function audioPlayerHtml(href: string, title: string | null | undefined, labelHtml: string, mimeType: string): string {
  const src = escapeHtml(href);
  const fallback =
    `<a href="${src}" title="${escapeHtml(title ?? "")}" class="audio">` +
    `<span class="fa-solid fa-play">${labelHtml}</span></a>`;
  return (
    `<audio controls><source src="${src}" type="${mimeType}">` +
    `Your browser does not support the audio element. ${fallback}</audio>`
  );
}

function createMarkdownParser(): Marked {
  const marked = new Marked({ gfm: true });
  marked.use({
    // strikethrough is the only extension on top of CommonMark
    tokenizer: {
      table() {
        return undefined;
      },
      url() {
        return undefined;
      },
    },
    renderer: {
      link(token: Tokens.Link) {
        const mimeType = getAudioMimeType(token.href);
        if (!mimeType) return false;
        const label = readAudioLabel(token.tokens);
        const labelHtml = label ? this.parser.parseInline([label]) : AUDIO_LABEL_PLACEHOLDER;
        return audioPlayerHtml(token.href, token.title, labelHtml, mimeType);
      },
    },
  });
  return marked;
}

const markdownParser = createMarkdownParser();

/**
 * Convert Markdown to HTML, rewriting cross-document and audio links.
 * Strikethrough (`~~text~~`) is enabled; GFM tables and bare-URL autolinks are not.
 *
 * @param markdown - Markdown body, without its metadata block
 * @returns HTML fragment
 *
 * @example
 * renderMarkdown('[Next](next.md)') // '<p><a href="next.html">Next</a></p>\n'
 */
export function renderMarkdown(markdown: string): string {
  const tokens = markdownParser.lexer(markdown);
  markdownParser.walkTokens(tokens, (token) => {
    if (isLink(token)) {
      token.href = rewriteMarkdownHref(token.href);
    }
  });
  return markdownParser.parser(tokens);
}

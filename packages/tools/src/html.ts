import * as cheerio from 'cheerio';

const MAX_STEPS = 10;
const MAX_LIST_ITEM = 200;
const MIN_PARAGRAPH = 20;
const SNIPPET_LENGTH = 200;

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Turn an answer body into short instructions: code blocks first
 * (prefixed `コマンド: `), then list items under 200 characters, then
 * paragraphs of 21-199 characters. At most 10.
 */
export function extractSteps(html: string): string[] {
  const $ = cheerio.load(html);
  const steps: string[] = [];

  $('pre').each((_, el) => {
    const code = $(el).text().trim();
    if (code) steps.push(`コマンド: ${code}`);
  });
  // Inline code outside <pre> was already counted with its block
  $('code')
    .filter((_, el) => $(el).parents('pre').length === 0)
    .each((_, el) => {
      const code = collapse($(el).text());
      if (code) steps.push(`コマンド: ${code}`);
    });

  $('li').each((_, el) => {
    const item = collapse($(el).text());
    if (item && item.length < MAX_LIST_ITEM) steps.push(item);
  });

  $('p').each((_, el) => {
    const text = collapse($(el).text());
    if (text.length > MIN_PARAGRAPH && text.length < MAX_LIST_ITEM) steps.push(text);
  });

  return steps.slice(0, MAX_STEPS);
}

/** Plain text of an HTML fragment, cut to 200 characters with `...`. */
export function extractSnippet(html: string): string {
  const text = collapse(cheerio.load(html).root().text());
  return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}...` : text;
}

/** Decode entities in an API string such as `Can&#39;t open &quot;file&quot;`. */
export function decodeEntities(text: string): string {
  return cheerio.load(`<p>${text}</p>`)('p').text();
}

const BOILERPLATE_TAGS = ['script', 'style', 'nav', 'footer', 'header', 'noscript'];

const NAMED_ENTITIES: Record<string, string> = {
  nbsp: ' ',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  ndash: '–',
  mdash: '—',
  hellip: '…',
  rsquo: '’',
  lsquo: '‘',
  rdquo: '”',
  ldquo: '“',
  copy: '©',
};

export function decodeEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (match, code: string) => safeFromCodePoint(Number(code)) ?? match)
    .replace(/&#x([0-9a-f]+);/gi, (match, code: string) => safeFromCodePoint(parseInt(code, 16)) ?? match)
    .replace(/&([a-z]+);/gi, (match, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? match)
    .replace(/&amp;/gi, '&');
}

function safeFromCodePoint(code: number): string | undefined {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : undefined;
}

/**
 * Visible text of an HTML page, one text run per line. Comments and
 * script, style, nav, footer, header and noscript blocks are dropped.
 */
export function htmlToText(html: string): string {
  let stripped = html.replace(/<!--[\s\S]*?-->/g, '');
  for (const tag of BOILERPLATE_TAGS) {
    stripped = stripped.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, 'gi'), '\n');
  }

  return decodeEntities(stripped.replace(/<[^>]+>/g, '\n'))
    .split('\n')
    .map(line => line.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}

export function extractTitle(html: string): string | undefined {
  const match = /<title\b[^>]*>([\s\S]*?)<\/title\s*>/i.exec(html);
  const title = match?.[1] ? decodeEntities(match[1]).replace(/\s+/g, ' ').trim() : '';
  return title || undefined;
}

/**
 * Absolute http(s) URLs of every `<a href>` in document order.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const links: string[] = [];
  const anchor = /<a\b[^>]*?\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi;

  for (const match of html.matchAll(anchor)) {
    const href = decodeEntities((match[1] ?? match[2] ?? match[3] ?? '').trim());
    if (!href || !URL.canParse(href, baseUrl)) {
      continue;
    }
    const url = new URL(href, baseUrl);
    if (url.protocol === 'http:' || url.protocol === 'https:') {
      links.push(url.href);
    }
  }

  return links;
}

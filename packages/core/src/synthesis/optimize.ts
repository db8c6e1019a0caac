/**
 * Post-processing for model-written articles: enforce the title, excerpt,
 * slug and tag conventions the quality gate and the blog expect.
 */

const TITLE_MIN = 30;
const TITLE_MAX = 60;
const EXCERPT_MAX = 160;
const MAX_TAGS = 10;

const BASE_TAGS = ['エラー解決', 'トラブルシューティング'];

const PLATFORM_TAGS: ReadonlyArray<readonly [readonly string[], readonly string[]]> = [
  [['windows'], ['Windows', 'Windows エラー']],
  [['macos', 'mac'], ['macOS', 'Mac エラー']],
  [['linux'], ['Linux', 'Linux エラー']],
];

const SOFTWARE_TAGS: ReadonlyArray<readonly [string, string]> = [
  ['chrome', 'Google Chrome'],
  ['firefox', 'Firefox'],
  ['edge', 'Microsoft Edge'],
  ['office', 'Microsoft Office'],
  ['adobe', 'Adobe'],
  ['steam', 'Steam'],
];

const SLUG_KEYWORD_PATTERNS = [
  /ERROR[_\s]+([A-Z_]+)/i,
  /0x([0-9A-F]+)/i,
  /([A-Z_]+)Exception/i,
  /([A-Z_]+)Error/i,
];

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Ensure the error text is in the title and the length is near 30-60
 * characters. A title missing the keyword is replaced outright.
 */
export function optimizeTitle(title: string, keyword: string, year: number): string {
  let result = title.trim();
  if (keyword && !result.includes(keyword)) {
    result = `${keyword}の解決方法【${year}年最新版】`;
  }

  if (result.length > TITLE_MAX) {
    return truncate(result, TITLE_MAX);
  }
  if (result.length < TITLE_MIN) {
    if (!result.includes('解決方法')) result += 'の解決方法';
    if (!result.includes(String(year))) result += `【${year}年版】`;
  }
  return result;
}

function platformLabel(lower: string): string | undefined {
  if (lower.includes('windows')) return 'Windows';
  if (lower.includes('macos') || lower.includes('mac')) return 'macOS';
  if (lower.includes('linux')) return 'Linux';
  return undefined;
}

/** Keep a usable excerpt, otherwise describe the article from the keyword. */
export function buildExcerpt(excerpt: string, keyword: string, solutionCount: number): string {
  const trimmed = excerpt.trim();
  if (trimmed) return truncate(trimmed, EXCERPT_MAX);

  let description = `${keyword}のエラーが発生した場合の解決方法を詳しく解説します。`;
  if (solutionCount > 1) {
    description += `${solutionCount}つの効果的な解決策をご紹介。`;
  }
  const platform = platformLabel(keyword.toLowerCase());
  if (platform) description += `${platform}対応。`;
  return truncate(description, EXCERPT_MAX);
}

/**
 * Derive a slug from the first error code in the text: `disk-full-solution-2026`
 * for `ERROR_DISK_FULL`. Without a code, fall back to the ASCII part of the text.
 */
export function generateSlug(keyword: string, year: number): string {
  for (const pattern of SLUG_KEYWORD_PATTERNS) {
    const match = pattern.exec(keyword);
    if (match?.[1]) {
      return `${match[1].toLowerCase().replace(/_/g, '-')}-solution-${year}`;
    }
  }

  const safe = keyword
    .toLowerCase()
    .replace(/[^a-z0-9\s_-]/g, '')
    .replace(/[-\s_]+/g, '-')
    .replace(/^-+/, '')
    .slice(0, 30)
    .replace(/-+$/, '');
  return safe ? `${safe}-solution` : 'error-solution';
}

/** Base tags, platform and error-code tags, then the model's own; deduplicated, at most 10. */
export function generateTags(existing: readonly string[], keyword: string): string[] {
  const lower = keyword.toLowerCase();
  const tags: string[] = [...BASE_TAGS];

  const platform = PLATFORM_TAGS.find(([needles]) => needles.some(n => lower.includes(n)));
  if (platform) tags.push(...platform[1]);

  if (/0x[0-9a-f]+/i.test(keyword)) tags.push('エラーコード');

  for (const [needle, tag] of SOFTWARE_TAGS) {
    if (lower.includes(needle)) tags.push(tag);
  }

  tags.push(...existing.map(t => t.trim()).filter(Boolean));
  return [...new Set(tags)].slice(0, MAX_TAGS);
}

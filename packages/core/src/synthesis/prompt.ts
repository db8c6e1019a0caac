/**
 * Prompts for article synthesis.
 *
 * The article is written in Japanese for a troubleshooting blog. The model
 * is asked for a single JSON object; `optimize.ts` repairs whatever fields
 * it gets wrong.
 */

import type { AggregatedBundle } from '../aggregation/types.js';

export type PlatformTemplate = 'windows' | 'macos' | 'linux' | 'software' | 'general';

const TEMPLATE_KEYWORDS: ReadonlyArray<readonly [PlatformTemplate, readonly string[]]> = [
  ['windows', ['windows', '0x', 'bsod', 'registry']],
  ['macos', ['macos', 'mac os', 'darwin', 'kernel panic']],
  ['linux', ['linux', 'ubuntu', 'debian', 'permission denied']],
  ['software', ['application', 'software', 'program']],
];

const TEMPLATE_NOTES: Record<PlatformTemplate, string> = {
  windows: '対象はWindowsです。設定アプリ・コマンドプロンプト・PowerShellそれぞれの操作手順を示し、管理者権限が必要な箇所は明記してください。',
  macos: '対象はmacOSです。システム設定とターミナルの両方の手順を示し、バージョンによる画面の違いに触れてください。',
  linux: '対象はLinuxです。主要なディストリビューション（Ubuntu/Debian系とRHEL系）ごとのコマンドを示し、sudoが必要な箇所を明記してください。',
  software: '対象は特定のアプリケーションです。再インストールや設定リセットの前に試せる軽い対処から順に説明してください。',
  general: '対象の環境が特定できない場合は、OSごとに分けて手順を示してください。',
};

/** Pick the platform addendum from keywords in the error text. */
export function selectTemplate(errorText: string): PlatformTemplate {
  const lower = errorText.toLowerCase();
  for (const [template, keywords] of TEMPLATE_KEYWORDS) {
    if (keywords.some(k => lower.includes(k))) return template;
  }
  return 'general';
}

export interface SystemPromptOptions {
  template: PlatformTemplate;
  minLength: number;
  maxLength: number;
}

export function buildSystemPrompt({ template, minLength, maxLength }: SystemPromptOptions): string {
  return `あなたはIT系トラブルシューティングブログの編集者です。
読者がエラーを自力で解決できるよう、正確で実行可能な解説記事を日本語で書いてください。

## 記事の要件
- 本文は${minLength}文字以上${maxLength}文字以下
- タイトルにはエラーメッセージ（エラー番号があれば必ず含める）を入れる
- 見出しは # を1つだけ、## を3つ以上、必要に応じて ### を使う
- 手順は番号付きリスト、注意点は箇条書きで書く
- コマンドやコードはコードブロック（\`\`\`）で囲む
- API、SQL などの略語は初出時に括弧で説明する
- 「また」「さらに」「ただし」などの接続語で段落をつなぐ

## 推奨構成
1. エラーの概要と症状
2. 主な原因
3. 解決方法（効果の高い順に複数）
4. 予防策
5. 関連するエラー
6. まとめ

## 環境
${TEMPLATE_NOTES[template]}

## 出力形式
次のキーを持つJSONオブジェクトだけを返してください。前後に説明文を付けないでください。
{
  "title": "記事タイトル（30〜60文字）",
  "slug": "英小文字・数字・ハイフンのみのURLスラッグ",
  "content": "Markdown形式の本文",
  "excerpt": "検索結果用の要約（100〜160文字）",
  "tags": ["タグ1", "タグ2", "タグ3"]
}`;
}

/** The gathered solutions and citations, rendered as the user turn. */
export function buildUserPrompt(bundle: AggregatedBundle): string {
  const lines: string[] = [
    '次のエラーについて解決記事を作成してください。',
    '',
    '## エラーメッセージ',
    bundle.candidate.text,
    '',
  ];

  if (bundle.solutions.length > 0) {
    lines.push('## 収集した解決策');
    bundle.solutions.forEach((solution, i) => {
      lines.push('', `### 解決策 ${i + 1}（信頼度 ${solution.reliability.toFixed(2)}）`);
      lines.push(`説明: ${solution.description}`);
      for (const step of solution.steps) {
        lines.push(`- ${step}`);
      }
      if (solution.sourceUrl) {
        lines.push(`出典: ${solution.sourceTitle} ${solution.sourceUrl}`);
      }
    });
    lines.push('');
  } else {
    lines.push('解決策は収集できませんでした。参考ソースと一般的な知識から構成してください。', '');
  }

  if (bundle.citations.length > 0) {
    lines.push('## 参考ソース');
    bundle.citations.forEach((citation, i) => {
      const kind = citation.type === 'official' ? '公式' : 'コミュニティ';
      lines.push(`${i + 1}. [${kind}] ${citation.title} - ${citation.url}`);
    });
    lines.push('');
  }

  lines.push('技術的な内容は正確に、初心者にも分かるように説明してください。');
  return lines.join('\n');
}

export function buildTagsPrompt(finalSummary: string, levelOne: readonly string[]): string {
  const material = [finalSummary, ...levelOne].join('\n\n');
  return `请从以下摘要中提取 2‑6 个用于检索的相关tags，保证清晰简洁明确。仅返回逗号、顿号或换行分隔的关键词列表，不要添加任何额外内容：\n\n${material}`;
}

export function buildDescriptionPrompt(finalSummary: string, maxChars: number): string {
  return `基于以下最终摘要，用一句话（≤${maxChars}字）写一个简介：\n\n${finalSummary}`;
}

export function buildChunkSummaryPrompt(segment: string, maxChars: number): string {
  return `请用不超过 ${maxChars} 字总结以下段落，不要添加任何额外内容：\n\n${segment}`;
}

export function buildFinalSummaryPrompt(levelOne: readonly string[], maxChars: number): string {
  return `以下是多段摘要，请综合压缩为不超过 ${maxChars} 字，不要添加任何额外内容：\n\n${levelOne.join('\n')}`;
}

/**
 * Translation prompts
 */

export function buildTitlePrompt(title: string, targetLanguage: string): string {
  return `请将以下标题翻译为${targetLanguage}，请不要添加任何除正文外的其它内容或者是AI翻译作为第三方的注解或评述，只保留翻译后的标题：\n${title}`;
}

export function buildTranslationPrompt(segment: string, targetLanguage: string): string {
  return `请将以下 Markdown 内容翻译为${targetLanguage}，保留原文中所有的有效正文并去除不相干的商业广告部分，保留所有原始超链接位置，保留 Markdown 语法但不添加任何代码块前后缀，不要添加任何额外内容：\n\n${segment}\n`;
}

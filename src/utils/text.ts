/**
 * Fit a long judgment into a prompt budget
 *
 * Texts over `maxChars` are sampled as beginning + middle + end: the
 * procedural context, the reasoning and the order.
 */
export function sampleText(fullText: string, maxChars: number): string {
  if (fullText.length <= maxChars) {
    return fullText;
  }

  const chunkSize = Math.floor(maxChars / 3);
  const start = fullText.substring(0, chunkSize);
  const middleStart = Math.floor(fullText.length / 2) - Math.floor(chunkSize / 2);
  const middle = fullText.substring(middleStart, middleStart + chunkSize);
  const end = fullText.substring(fullText.length - chunkSize);

  return `${start}\n\n[...]\n\n${middle}\n\n[...]\n\n${end}`;
}

/**
 * Strip markdown emphasis and heading markers
 */
export function stripMarkdown(text: string): string {
  return text.replace(/[#*]/g, '').trim();
}

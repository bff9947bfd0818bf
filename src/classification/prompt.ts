export const CLASSIFICATION_SYSTEM_PROMPT =
  'You are an AI assistant specialized in South African legal case classification. ' +
  'Your goal is to pick exactly ONE domain from the provided list of candidate labels, ' +
  'based on which domain best fits the text. ' +
  'If you must guess, do so with the best logical reasoning. ' +
  'Respond ONLY with the chosen label, nothing else.';

export function buildClassificationPrompt(text: string, labels: string[]): string {
  return `Text to classify:\n'''${text}'''\n\nCandidate labels: ${labels.join(', ')}\nWhich single label best describes this text?`;
}

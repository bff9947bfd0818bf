export const SHORT_SUMMARY_SYSTEM_PROMPT =
  'You are an AI specialized in generating South African law headnotes.';

/**
 * Headnote-style summary in the manner of the South African Law Reports
 */
export function buildShortSummaryPrompt(text: string): string {
  return `Please read the following case text and produce a concise headnote in the style of the South African Law Reports.
The headnote must include only the crucial legal points, a summary of relevant facts, and the main holding.

Maintain the structure of a headnote as follows:
1. Topic and subtopic, such as "Execution — Sale in execution — Notice …"
2. Brief summary of the relevant facts
3. Legal issue
4. Holding/Conclusion

Do not include any additional commentary or full citations; produce only the essential legal points in the style of a reported case headnote.

Here is an example:
Execution — Sale in execution — Notice of sale in execution — Rule 46(7)(c) of Uniform Rules requiring publication of notice in Gazette two weeks before date of appointed sale — Advertisement not placed timeously — No evidence of prejudice to any affected parties — Failure to observe time requirements for publication in Gazette condonable and not constituting defect fatal to validity of sale

Case text:
${text}

Provide only the summary, without any additional commentary or formatting.`;
}

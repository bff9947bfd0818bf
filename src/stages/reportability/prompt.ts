export const REPORTABILITY_SYSTEM_PROMPT =
  "You are a highly critical legal expert analyzing court judgments. Be extremely strict in your scoring - only truly significant judgments should score above 75. Always start your response with 'Reportability Score: XX' where XX is a number between 0 and 100.";

export function buildReportabilityPrompt(text: string): string {
  return `Analyze the provided judgment and assign a 'reportability score' between 0 and 100. Be extremely strict in your scoring - only truly significant judgments should score above 75.

Your response MUST start with 'Reportability Score: XX' where XX is the numerical score.

Score the judgment based on these criteria:

1. **Legal Significance (Weight: 35)**:
   - High (30-35): Establishes new legal principle or significantly modifies existing law
   - Medium (20-29): Clarifies existing legal principles
   - Low (0-19): Merely applies established principles

2. **Precedential Value (Weight: 25)**:
   - High (20-25): From higher courts (Constitutional Court, SCA) AND likely to be widely cited
   - Medium (10-19): From high courts AND addresses important legal issues
   - Low (0-9): Limited precedential value or routine application of law

3. **Practical Impact (Weight: 20)**:
   - High (15-20): Major implications for legal practice or society at large
   - Medium (8-14): Moderate impact on specific legal areas
   - Low (0-7): Minimal practical impact beyond the parties involved

4. **Quality of Reasoning (Weight: 15)**:
   - High (12-15): Exceptional analysis, comprehensive research, novel legal insights
   - Medium (6-11): Sound reasoning but not exceptional
   - Low (0-5): Basic or flawed reasoning

5. **Public Interest (Weight: 5)**:
   - High (4-5): Significant public importance or media attention
   - Medium (2-3): Moderate public interest
   - Low (0-1): Limited public interest

Make sure your category scores add up to your total reportability score.
For each category, state the score in this format: 'Score: XX/YY' where XX is the score given and YY is the maximum possible score for that category.

Example format:
Reportability Score: 85

1. Legal Significance (Weight: 35%)
Score: 30/35
[Explanation...]

[Continue with other categories...]

Here is the judgment text:
${text}`;
}

/**
 * Structured long summary. Sections are paragraphs, never lists.
 */
export function buildLongSummaryPrompt(text: string): string {
  return `Summarize the provided judgment in the following structured legal format, presented in paragraphs without numbered or bulleted lists. Use precise terminology and replicate the sections, headings, and order below:

**Case Note**:
Explain why the case is reportable (e.g., novel principles, application of existing law). Mention the key legal principles or doctrines that were applied. Do not start the sentence with "This case is reportable because...".

**Cases Cited**:
Identify all cases mentioned in the judgment, using the correct citation style (e.g., Case Name [Year] Court Abbreviation Volume/Report Page). Present them in paragraphs.

**Legislation Cited**:
Describe any statutes or regulations referenced. For instance: Road Accident Fund Act Section 17(1)(b).

**Rules of Court Cited**:
Describe any rules of court referenced. For instance: Rule 1.1(a) of the Rules of Court.

**HEADNOTE**:
**Summary**:
One or two paragraphs on the core claim and the outcome.
**Key Issues**:
The main legal issues phrased as questions, if relevant.
**Held**:
The ultimate holding or decision, in concise terms.

**THE FACTS**:
A comprehensive account of the facts in no less than three paragraphs, including the parties, essential events, claims, and any relevant procedural history.

**THE ISSUES**:
The legal questions the court had to determine, in paragraph form. For example, (1) Whether…, (2) Whether…

**ANALYSIS**:
The court's reasoning for each issue in no less than three paragraphs, explaining how the court applied legal principles to the facts.

**REMEDY**:
The relief granted or the final order of the court (e.g., application dismissed with costs).

**LEGAL PRINCIPLES**:
The key legal principles or rules that guided the court's decision, in no less than three paragraphs. Include direct quotes from cases or statutes where necessary, within paragraphs.

Full text:
${text}`;
}

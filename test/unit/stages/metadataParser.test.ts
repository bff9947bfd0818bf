import { describe, expect, it } from 'vitest';
import { MetadataParser, parseLongDate, parseParties } from '../../../src/stages/fix-metadata/metadataParser.js';
import { TEST_COURTS } from '../../helpers/fakes.js';

describe('parseLongDate', () => {
  it('converts a long-form date', () => {
    expect(parseLongDate('12 March 2023')).toBe('2023-03-12');
    expect(parseLongDate('3 may 2021')).toBe('2021-05-03');
  });

  it('rejects impossible dates and unknown months', () => {
    expect(parseLongDate('31 February 2023')).toBeNull();
    expect(parseLongDate('12 Brumaire 2023')).toBeNull();
  });
});

describe('parseParties', () => {
  it('splits an "A v B" caption', () => {
    expect(parseParties('Minister of Home Affairs v Smith and Others (CCT 12/22)')).toEqual([
      'Minister of Home Affairs',
      'Smith and Others',
    ]);
  });

  it('returns nothing for a caption without "v"', () => {
    expect(parseParties('In re: Estate Late Nkosi [2023] ZASCA 4')).toEqual([]);
  });
});

describe('MetadataParser', () => {
  it('takes citation, case number, date and parties from the title', () => {
    const text = [
      'CONSTITUTIONAL COURT OF SOUTH AFRICA',
      'Coram: Zondo CJ, Madlanga J and Theron J',
      'Judgment by: Madlanga J',
      '',
      'The applicant seeks leave to appeal.',
    ].join('\n');
    const title = 'Minister of Home Affairs v Smith and Others (CCT 12/22) [2023] ZACC 5 (14 March 2023)';

    const metadata = new MetadataParser(text, title, TEST_COURTS.courts).extractAll();

    expect(metadata).toEqual({
      neutralCitation: '[2023] ZACC 5',
      caseNumber: 'CCT 12/22',
      judgmentDate: '2023-03-14',
      courtName: 'Constitutional Court of South Africa',
      parties: ['Minister of Home Affairs', 'Smith and Others'],
      judges: ['Madlanga J', 'Theron J', 'Zondo CJ'],
    });
  });

  it('falls back to the header text', () => {
    const text = [
      'IN THE SUPREME COURT OF APPEAL OF SOUTH AFRICA',
      'Case No: 123/2022',
      'Date of Judgment: 3 May 2023',
      'Before: Ponnan JA and Mocumie JA',
    ].join('\n');

    const metadata = new MetadataParser(text, 'S v Dlamini', TEST_COURTS.courts).extractAll();

    expect(metadata).toEqual({
      neutralCitation: null,
      caseNumber: '123/2022',
      judgmentDate: '2023-05-03',
      courtName: 'Supreme Court of Appeal',
      parties: ['S', 'Dlamini'],
      judges: ['Mocumie JA', 'Ponnan JA'],
    });
  });

  it('ignores names without a judicial title', () => {
    const parser = new MetadataParser('Coram: the full bench, Mr Smith', 'X v Y', TEST_COURTS.courts);

    expect(parser.extractJudges()).toEqual([]);
  });
});

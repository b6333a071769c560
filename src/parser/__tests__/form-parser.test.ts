import { FormParser, contentLines, parseFormPages, parseFormText } from '../form-parser';
import { combinePageTexts } from '../../ocr/text-extractor';
import { MissingRequiredFieldError } from '../../shared/errors';
import { serializeFields } from '../../storage/form-store';

describe('Form Parser', () => {
  it('should split a simple intake form into identity and fields', () => {
    const record = parseFormText('Name: Jane Doe\nDOB: 1990-05-01\nBlood Pressure: 120/80');

    expect(record.name).toBe('Jane Doe');
    expect(record.dob).toBe('1990-05-01');
    expect(Array.from(record.fields)).toEqual([['Blood Pressure', '120/80']]);
    expect(serializeFields(record.fields)).toBe('{"Blood Pressure":"120/80"}');
  });

  it('should read across page markers and number unlabeled lines', () => {
    const text = [
      '--- Page 1 ---',
      'Patient Name: John Smith',
      'Date of Birth: 12/25/1980',
      '--- Page 2 ---',
      'Allergies: penicillin',
      'Reviewed by nurse',
    ].join('\n');

    const record = parseFormText(text);

    expect(record.name).toBe('John Smith');
    expect(record.dob).toBe('1980-12-25');
    expect(Array.from(record.fields)).toEqual([
      ['Allergies', 'penicillin'],
      ['line_4', 'Reviewed by nurse'],
    ]);
  });

  it('should ignore blank lines and surrounding whitespace', () => {
    const record = parseFormText('   Name:   Jane    Doe ,  \n\n   \n  Pulse: 72  ');

    expect(record.name).toBe('Jane Doe');
    expect(record.dob).toBeNull();
    expect(Array.from(record.fields)).toEqual([['Pulse', '72']]);
  });

  it('should accept semicolons and possessive labels', () => {
    const record = parseFormText("patient's name; Mary Major\nD.O.B. 1975-03-09");

    expect(record.name).toBe('Mary Major');
    expect(record.dob).toBe('1975-03-09');
    expect(record.fields.size).toBe(0);
  });

  it('should fail with MissingRequiredField when no name is present', () => {
    expect(() => parseFormText('DOB: 1990-05-01\nPulse: 72')).toThrow(MissingRequiredFieldError);

    try {
      parseFormText('DOB: 1990-05-01\nPulse: 72');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredFieldError);
      if (error instanceof MissingRequiredFieldError) {
        expect(error.code).toBe('MissingRequiredField');
        expect(error.stage).toBe('parse');
        expect(error.field).toBe('name');
      }
    }
  });

  it('should treat an empty name as missing', () => {
    expect(() => parseFormText('Name:\nDOB: 1990-05-01')).toThrow(MissingRequiredFieldError);
  });

  it('should keep an unresolvable date of birth as dob_raw', () => {
    const record = parseFormText('Name: Ana Lopez\nDOB: 05/01/1990\nWeight: 60 kg');

    expect(record.dob).toBeNull();
    expect(Array.from(record.fields)).toEqual([
      ['dob_raw', '05/01/1990'],
      ['Weight', '60 kg'],
    ]);
  });

  it('should apply the configured date order', () => {
    const parser = new FormParser({ dateOrder: 'DMY' });
    const record = parser.parse('Name: Ana Lopez\nDOB: 05/01/1990');

    expect(record.dob).toBe('1990-01-05');
    expect(record.fields.size).toBe(0);
  });

  it('should keep the first name and dob and file later ones as fields', () => {
    const record = parseFormText('Name: Jane Doe\nName: John Roe\nDOB: 1990-05-01\nDOB: 1991-01-01');

    expect(record.name).toBe('Jane Doe');
    expect(record.dob).toBe('1990-05-01');
    expect(Array.from(record.fields)).toEqual([
      ['Name', 'John Roe'],
      ['DOB', '1991-01-01'],
    ]);
  });

  it('should suffix repeated labels instead of overwriting them', () => {
    const record = parseFormText('Name: Jane Doe\nNote: first\nNote: second\nNote: third');

    expect(Array.from(record.fields)).toEqual([
      ['Note', 'first'],
      ['Note (2)', 'second'],
      ['Note (3)', 'third'],
    ]);
  });

  it('should take the value of a bare label from the next line', () => {
    const record = parseFormText('Name:\nJane Doe\nDOB:\n1990-05-01\nWeight: 60 kg');

    expect(record.name).toBe('Jane Doe');
    expect(record.dob).toBe('1990-05-01');
    expect(Array.from(record.fields)).toEqual([['Weight', '60 kg']]);
  });

  it('should account for every content line', () => {
    const text = [
      '--- Page 1 ---',
      'ASSESSMENT FORM',
      'Name: Jane Doe',
      'DOB: 1990-05-01',
      'Temp: 37.2 C',
      'Time: 10:30',
      'Temp: 37.4 C',
      '--- Page 2 ---',
      'Patient reports mild headache',
      'Signature: ____',
    ].join('\n');

    const record = parseFormText(text);
    const lines = contentLines(text);

    expect(lines).toHaveLength(8);
    expect(record.fields.size + 2).toBe(lines.length);
    expect(Array.from(record.fields)).toEqual([
      ['line_1', 'ASSESSMENT FORM'],
      ['Temp', '37.2 C'],
      ['Time', '10:30'],
      ['Temp (2)', '37.4 C'],
      ['line_7', 'Patient reports mild headache'],
      ['Signature', '____'],
    ]);
  });

  it('should be deterministic', () => {
    const text = 'Name: Jane Doe\nDOB: 1990-05-01\nBP: 120/80\nNotes\nBP: 118/79';

    const first = parseFormText(text);
    const second = parseFormText(text);

    expect(second).toEqual(first);
    expect(serializeFields(second.fields)).toBe(serializeFields(first.fields));
  });
  it('should split a line holding two labeled fields', () => {
    const record = parseFormText('Patient Name: Jane Doe    DOB: 1990-05-01\nDate: 2024-10-10   DOB: 1990-05-01');

    expect(record.name).toBe('Jane Doe');
    expect(record.dob).toBe('1990-05-01');
    expect(Array.from(record.fields)).toEqual([
      ['Date', '2024-10-10'],
      ['DOB', '1990-05-01'],
    ]);
  });

  it('should find a date of birth after the name on a single-spaced line', () => {
    const record = parseFormText('Name: Jane Doe DOB: 05/14/1990');

    expect(record.name).toBe('Jane Doe');
    expect(record.dob).toBe('1990-05-14');
    expect(record.fields.size).toBe(0);
  });

  it('should not split a label that merely mentions a date of birth', () => {
    const record = parseFormText('Name: Jane Doe\nMother date of birth: 1960-02-02\nDOB: 1990-05-01');

    expect(record.dob).toBe('1990-05-01');
    expect(Array.from(record.fields)).toEqual([['Mother date of birth', '1960-02-02']]);
  });

  it('should read assessment answers, scores and vitals', () => {
    const text = [
      'Name: Jane Doe',
      'Patient changes since last treatment:',
      'Walking further without a cane',
      'Sleeping better',
      'INJECTION: [X] YES [ ] NO',
      'Exercise Therapy: no',
      'Bending or Stooping: 3',
      'Stairs: 4/5',
      'Driving: 7',
      'Pain: 6/10',
      'Numbness: 2',
      'HR: 72bpm',
      'SpO2: 98 %',
      'Blood Pressure: 120 / 80',
      'Weight: 180 lbs',
      'Respirations: 16',
      'Describe any functional changes within the last three days (good or bad):',
      'Could garden for an hour',
    ].join('\n');

    const record = parseFormText(text);

    expect(Array.from(record.fields)).toEqual([
      ['Patient changes since last treatment', 'Walking further without a cane\nSleeping better'],
      ['INJECTION', 'YES'],
      ['Exercise Therapy', 'NO'],
      ['Bending or Stooping', '3'],
      ['Stairs', '4'],
      ['Driving', '7'],
      ['Pain', '6'],
      ['Numbness', '2'],
      ['HR', '72 bpm'],
      ['SpO2', '98%'],
      ['Blood Pressure', '120/80'],
      ['Weight', '180 lbs'],
      ['Respirations', '16'],
      ['Describe any functional changes within the last three days (good or bad)', 'Could garden for an hour'],
    ]);
  });

  it('should keep an answer that does not fit its question as written', () => {
    const record = parseFormText('Name: Jane Doe\nPain: worse at night\nINJECTION: YES NO');

    expect(Array.from(record.fields)).toEqual([
      ['Pain', 'worse at night'],
      ['INJECTION', 'YES NO'],
    ]);
  });

  it('should keep OCR lines that read like page markers when parsing pages', () => {
    const pages = [
      { pageNumber: 2, text: 'Allergies: none\n--- Page 7 ---' },
      { pageNumber: 1, text: 'Name: Jane Doe\nDOB: 1990-05-01' },
    ];

    const record = new FormParser().parsePages(pages);

    expect(record.name).toBe('Jane Doe');
    expect(record.dob).toBe('1990-05-01');
    expect(Array.from(record.fields)).toEqual([
      ['Allergies', 'none'],
      ['line_4', '--- Page 7 ---'],
    ]);
    expect(Array.from(parseFormText(combinePageTexts(pages)).fields)).toEqual([['Allergies', 'none']]);
    expect(parseFormPages(pages)).toEqual(record);
  });
});

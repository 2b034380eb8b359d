import { describe, expect, it } from 'vitest';
import { htmlToText, parseTestSteps } from '../src/index.js';

describe('parseTestSteps', () => {
  it('reads action and expected result of each step', () => {
    const xml =
      '<steps id="0" last="3">' +
      '<step id="2" type="ActionStep">' +
      '<parameterizedString isformatted="true">&lt;DIV&gt;&lt;P&gt;Open the login page&lt;/P&gt;&lt;/DIV&gt;</parameterizedString>' +
      '<parameterizedString isformatted="true">&lt;P&gt;Form is shown&amp;nbsp;&lt;/P&gt;</parameterizedString>' +
      '<description/>' +
      '</step>' +
      '<step id="3" type="ValidateStep">' +
      '<parameterizedString isformatted="true">Submit</parameterizedString>' +
      '<parameterizedString isformatted="true"/>' +
      '</step>' +
      '</steps>';

    expect(parseTestSteps(xml)).toEqual([
      { id: '2', type: 'ActionStep', action: 'Open the login page', expected: 'Form is shown' },
      { id: '3', type: 'ValidateStep', action: 'Submit', expected: '' },
    ]);
  });

  it('decodes character references in the XML and in the rich text', () => {
    const xml =
      '<steps id="0" last="2">' +
      '<step id="2" type="ActionStep">' +
      '<parameterizedString isformatted="true">Open the caf&#233; menu</parameterizedString>' +
      '<parameterizedString isformatted="true">&lt;P&gt;Price shows &amp;#8364;4&amp;#x2C;50&lt;/P&gt;</parameterizedString>' +
      '</step>' +
      '</steps>';

    expect(parseTestSteps(xml)).toEqual([
      { id: '2', type: 'ActionStep', action: 'Open the café menu', expected: 'Price shows €4,50' },
    ]);
  });

  it('returns no steps for empty or malformed input', () => {
    expect(parseTestSteps(undefined)).toEqual([]);
    expect(parseTestSteps('   ')).toEqual([]);
    expect(parseTestSteps('<steps><step>')).toEqual([]);
  });
});

describe('htmlToText', () => {
  it('strips tags and collapses whitespace', () => {
    expect(htmlToText('<DIV><P>Click</P><P>Save&amp;close</P></DIV>')).toBe('Click Save&close');
  });

  it('decodes numeric references but leaves escaped ones literal', () => {
    expect(htmlToText('Don&#39;t&nbsp;stop &#x41;&amp;#66;')).toBe("Don't stop A&#66;");
  });
});

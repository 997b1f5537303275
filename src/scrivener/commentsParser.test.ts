import { describe, it, expect } from 'vitest';
import { parseComments, stripRtfControls } from './commentsParser';
import { parseWritingHistory } from './writingHistory';

describe('parseComments', () => {
  it('converts RTF comment bodies to Markdown', () => {
    const xml =
      '<Comments>' +
      '<Comment ID="C1" Color="1.0 1.0 0.0"><![CDATA[{\\rtf1 Nice \\b line}]]></Comment>' +
      '<Comment ID="C2">  plain words </Comment>' +
      '</Comments>';

    expect(parseComments(xml)).toEqual([
      { id: 'C1', text: 'Nice **line**', color: '#FFFF00' },
      { id: 'C2', text: 'plain words', color: '#FFFF00' },
    ]);
  });

  it('salvages text from RTF the decoder rejects', () => {
    expect(stripRtfControls('\\pard\\f0 Hello {\\b0} there')).toBe('Hello  there');
  });
});

describe('parseWritingHistory', () => {
  it('reads current and older attribute names', () => {
    const xml =
      '<WritingHistory>' +
      '<Day Date="2024-02-01" WordCount="1200" DraftWordCount="5000" Duration="1800.5"/>' +
      '<Day Date="2024-02-02" Words="300" TotalWords="5300"/>' +
      '<Day Date="not-a-day" WordCount="9"/>' +
      '</WritingHistory>';

    const entries = parseWritingHistory(xml);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toEqual({
      date: new Date('2024-02-01T00:00:00Z'),
      wordsWritten: 1200,
      draftWordCount: 5000,
      sessionDuration: 1800.5,
    });
    expect(entries[1]).toEqual({
      date: new Date('2024-02-02T00:00:00Z'),
      wordsWritten: 300,
      draftWordCount: 5300,
      sessionDuration: undefined,
    });
  });
});

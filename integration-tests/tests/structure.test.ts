/**
 * Structure building end to end: raw files in, ordered Structure out.
 */

import {
  StructureValidationError,
  compareTags,
  extractStructure,
  parseStructure,
  retagStructure,
  serializeStructure,
  type Structure,
} from '@submittal/shared';
import { FakeTextExtractor, SCENARIO_FILES, rawFiles } from './helpers';

function tagsOf(structure: Structure): string[] {
  return structure.groups.map((group) => group.tag);
}

function filenamesOf(structure: Structure, tag: string): string[] {
  return structure.groups.find((group) => group.tag === tag)?.documents.map((d) => d.filename) ?? [];
}

describe('extractStructure', () => {
  it('builds the four-file project', async () => {
    const { structure, failures, ambiguities, tag_ambiguities } = await extractStructure(
      rawFiles(SCENARIO_FILES),
      'filename'
    );

    expect(failures).toEqual([]);
    expect(ambiguities).toEqual([]);
    expect(tag_ambiguities).toEqual([]);
    expect(structure).toEqual({
      schema_version: '1.0',
      extraction_mode: 'filename',
      groups: [
        {
          tag: 'MAU-5',
          display_name: 'MAU-5',
          order: 1,
          documents: [
            {
              filename: 'MAU-5 - Technical Data Sheet.docx',
              path: '/input/MAU-5 - Technical Data Sheet.docx',
              size_bytes: 1024,
              role: 'technical_data',
              document_type: 'Technical Data Sheet',
              confidence: 1.0,
              source: 'filename',
              rule: 'explicit_tag',
              position: 1,
            },
          ],
        },
        {
          tag: 'AHU-10',
          display_name: 'AHU-10',
          order: 2,
          documents: [
            {
              filename: 'AHU-10 - Technical Data Sheet.docx',
              path: '/input/AHU-10 - Technical Data Sheet.docx',
              size_bytes: 1024,
              role: 'technical_data',
              document_type: 'Technical Data Sheet',
              confidence: 1.0,
              source: 'filename',
              rule: 'explicit_tag',
              position: 1,
            },
            {
              filename: 'AHU-10 - Fan Curve.jpg',
              path: '/input/AHU-10 - Fan Curve.jpg',
              size_bytes: 1024,
              role: 'fan_curve',
              document_type: 'Fan Curve',
              confidence: 1.0,
              source: 'filename',
              rule: 'explicit_tag',
              position: 2,
            },
          ],
        },
      ],
      cut_sheets: {
        label: 'Cut Sheets',
        documents: [
          {
            filename: 'CS_Filter.pdf',
            path: '/input/CS_Filter.pdf',
            size_bytes: 1024,
            role: 'cutsheet',
            document_type: 'cutsheet',
            confidence: 1.0,
            source: 'filename',
            rule: 'cutsheet_prefix',
            position: 1,
          },
        ],
      },
      unclassified: [],
    });
  });

  it('puts MAU equipment first, then orders by number and prefix', async () => {
    const { structure } = await extractStructure(
      rawFiles([
        'AHU-2 - Drawing.pdf',
        'EF-1 - Drawing.pdf',
        'MAU-12 - Drawing.pdf',
        'AHU-1 - Drawing.pdf',
        'MAU-3 - Drawing.pdf',
      ]),
      'filename'
    );

    expect(tagsOf(structure)).toEqual(['MAU-3', 'MAU-12', 'AHU-1', 'EF-1', 'AHU-2']);
    expect(structure.groups.map((g) => g.order)).toEqual([1, 2, 3, 4, 5]);
  });

  it('orders documents by role, then filename', async () => {
    const { structure } = await extractStructure(
      rawFiles([
        'AHU-1 - Specifications.pdf',
        'AHU-1 - Drawing B.pdf',
        'AHU-1 - Drawing A.pdf',
        'AHU-1 - Warranty.pdf',
        'AHU-1 - Technical Data.docx',
      ]),
      'filename'
    );

    expect(filenamesOf(structure, 'AHU-1')).toEqual([
      'AHU-1 - Technical Data.docx',
      'AHU-1 - Drawing A.pdf',
      'AHU-1 - Drawing B.pdf',
      'AHU-1 - Specifications.pdf',
      'AHU-1 - Warranty.pdf',
    ]);
    expect(structure.groups[0].documents.map((d) => d.position)).toEqual([1, 2, 3, 4, 5]);
  });

  it('gives the same structure for the same files in any order', async () => {
    const files = rawFiles([...SCENARIO_FILES, '99_Unknown.docx', 'EF-3 - Drawing.pdf']);
    const first = await extractStructure(files, 'filename');
    const again = await extractStructure(files, 'filename');
    const reversed = await extractStructure([...files].reverse(), 'filename');

    expect(again.structure).toEqual(first.structure);
    expect(reversed.structure).toEqual(first.structure);
    expect(serializeStructure(reversed.structure)).toBe(serializeStructure(first.structure));
  });

  it('returns a frozen structure', async () => {
    const { structure } = await extractStructure(rawFiles(SCENARIO_FILES), 'filename');

    expect(Object.isFrozen(structure)).toBe(true);
    expect(Object.isFrozen(structure.groups)).toBe(true);
    expect(Object.isFrozen(structure.groups[1].documents[0])).toBe(true);
  });

  it('leaves cut sheets null when there are none', async () => {
    const { structure } = await extractStructure(rawFiles(['EF-1 - Drawing.pdf']), 'filename');
    expect(structure.cut_sheets).toBeNull();
  });

  it('lists files it cannot tag as unclassified', async () => {
    const { structure, failures } = await extractStructure(
      rawFiles(['Zeta notes.pdf', '99_Unknown.docx', 'EF-1 - Drawing.pdf']),
      'filename'
    );

    expect(tagsOf(structure)).toEqual(['EF-1']);
    expect(structure.unclassified).toEqual([
      {
        filename: '99_Unknown.docx',
        path: '/input/99_Unknown.docx',
        size_bytes: 1024,
        reason: 'numeric prefix 99 has no known tag',
      },
      {
        filename: 'Zeta notes.pdf',
        path: '/input/Zeta notes.pdf',
        size_bytes: 1024,
        reason: 'no filename rule matched',
      },
    ]);
    expect(failures).toHaveLength(2);
  });

  it('tags numeric-prefix files from content in content mode', async () => {
    const files = rawFiles([
      '10_Technical_Data_Sheet.docx',
      '10_Fan_Curve.jpg',
      'Startup Report.pdf',
    ]);
    const text = new FakeTextExtractor()
      .set('/input/10_Technical_Data_Sheet.docx', 'Unit Tag: AHU-10')
      .set('/input/Startup Report.pdf', 'Equipment ID: MAU-2');

    const { structure } = await extractStructure(files, 'content', { textExtractor: text });

    expect(tagsOf(structure)).toEqual(['MAU-2', 'AHU-10']);
    expect(filenamesOf(structure, 'AHU-10')).toEqual([
      '10_Technical_Data_Sheet.docx',
      '10_Fan_Curve.jpg',
    ]);
    expect(structure.groups[1].documents.map((d) => [d.role, d.rule, d.confidence])).toEqual([
      ['technical_data', 'numeric_prefix', 0.8],
      ['fan_curve', 'numeric_prefix', 0.8],
    ]);
    expect(structure.groups[0].documents[0]).toMatchObject({
      filename: 'Startup Report.pdf',
      role: 'unknown',
      document_type: 'Startup Report',
      source: 'content',
      rule: 'labeled_tag',
      confidence: 0.9,
    });
    expect([...text.calls].sort()).toEqual([
      '/input/10_Fan_Curve.jpg',
      '/input/10_Technical_Data_Sheet.docx',
      '/input/Startup Report.pdf',
    ]);
  });

  it('flags documents whose text names several tags', async () => {
    const files = rawFiles(['Startup Report.pdf', 'Balancing Report.pdf']);
    const text = new FakeTextExtractor()
      .set('/input/Startup Report.pdf', 'Serves AHU-3 and EF-7 and MAU-2')
      .set('/input/Balancing Report.pdf', 'Serves EF-7 only');

    const { structure, failures, tag_ambiguities } = await extractStructure(files, 'content', {
      textExtractor: text,
    });

    expect(failures).toEqual([]);
    expect(tag_ambiguities).toEqual([
      {
        filename: 'Startup Report.pdf',
        path: '/input/Startup Report.pdf',
        chosen_tag: 'AHU-3',
        candidates: ['AHU-3', 'EF-7', 'MAU-2'],
      },
    ]);
    expect(tagsOf(structure)).toEqual(['AHU-3', 'EF-7']);
  });

  it('never reads contents in filename mode', async () => {
    const text = new FakeTextExtractor().set('/input/Startup Report.pdf', 'Equipment ID: MAU-2');
    const { structure } = await extractStructure(rawFiles(['Startup Report.pdf']), 'filename', {
      textExtractor: text,
    });

    expect(structure.groups).toEqual([]);
    expect(text.calls).toEqual([]);
  });

  it('reports documents whose type names more than one role', async () => {
    const { ambiguities, structure } = await extractStructure(
      rawFiles(['AHU-1 - Drawing and Specification.pdf']),
      'filename'
    );

    expect(ambiguities).toEqual([
      {
        filename: 'AHU-1 - Drawing and Specification.pdf',
        document_type: 'Drawing and Specification',
        matched_roles: ['drawing', 'specification'],
        resolved_role: 'drawing',
      },
    ]);
    expect(structure.groups[0].documents[0].role).toBe('drawing');
  });

  it('ignores a file listed twice', async () => {
    const files = rawFiles(['EF-1 - Drawing.pdf', 'EF-1 - Drawing.pdf']);
    const { structure } = await extractStructure(files, 'filename');

    expect(filenamesOf(structure, 'EF-1')).toEqual(['EF-1 - Drawing.pdf']);
  });

  it('groups explicit tags whatever their prefix', async () => {
    const { structure, failures } = await extractStructure(
      rawFiles(['ERV-1 - Technical Data Sheet.docx', 'GRD-2 - Drawing.pdf']),
      'filename'
    );
    expect(failures).toEqual([]);
    expect(tagsOf(structure)).toEqual(['ERV-1', 'GRD-2']);
  });

  it('honours a custom unit-type vocabulary for bare tags in content', async () => {
    const files = rawFiles(['Notes.pdf']);
    const text = new FakeTextExtractor().set('/input/Notes.pdf', 'Serves XYZ-4 only');

    const custom = await extractStructure(files, 'content', {
      textExtractor: text,
      unitTypes: ['XYZ'],
    });
    expect(tagsOf(custom.structure)).toEqual(['XYZ-4']);

    const standard = await extractStructure(files, 'content', { textExtractor: text });
    expect(tagsOf(standard.structure)).toEqual([]);
  });
});

describe('compareTags', () => {
  it('sorts malformed tags after well-formed ones', () => {
    expect(['odd', 'AHU-1', 'MAU-9'].sort(compareTags)).toEqual(['MAU-9', 'AHU-1', 'odd']);
  });
});

describe('retagStructure', () => {
  async function scenario(extra: string[] = []): Promise<Structure> {
    const { structure } = await extractStructure(rawFiles([...SCENARIO_FILES, ...extra]), 'filename');
    return structure;
  }

  it('moves a document to another group and marks it manual', async () => {
    const retagged = retagStructure(await scenario(), { 'AHU-10 - Fan Curve.jpg': 'mau-5' });

    expect(tagsOf(retagged)).toEqual(['MAU-5', 'AHU-10']);
    expect(filenamesOf(retagged, 'MAU-5')).toEqual([
      'MAU-5 - Technical Data Sheet.docx',
      'AHU-10 - Fan Curve.jpg',
    ]);
    expect(retagged.groups[0].documents[1]).toMatchObject({
      role: 'fan_curve',
      confidence: 1.0,
      rule: 'manual',
      position: 2,
    });
    expect(filenamesOf(retagged, 'AHU-10')).toEqual(['AHU-10 - Technical Data Sheet.docx']);
  });

  it('pulls an unclassified file into the structure', async () => {
    const structure = await scenario(['99_Unknown.docx']);
    expect(structure.unclassified).toHaveLength(1);

    const retagged = retagStructure(structure, { '99_Unknown.docx': 'EF-9' });

    expect(tagsOf(retagged)).toEqual(['MAU-5', 'EF-9', 'AHU-10']);
    expect(retagged.groups[1].documents[0]).toMatchObject({
      filename: '99_Unknown.docx',
      document_type: 'Unknown',
      role: 'unknown',
      rule: 'manual',
    });
    expect(retagged.unclassified).toEqual([]);
  });

  it('drops the cut-sheet section when its last document is retagged', async () => {
    const retagged = retagStructure(await scenario(), { 'CS_Filter.pdf': 'AHU-10' });

    expect(retagged.cut_sheets).toBeNull();
    expect(filenamesOf(retagged, 'AHU-10')).toEqual([
      'AHU-10 - Technical Data Sheet.docx',
      'AHU-10 - Fan Curve.jpg',
      'CS_Filter.pdf',
    ]);
  });

  it('keeps custom display names', async () => {
    const edited: Structure = JSON.parse(serializeStructure(await scenario()));
    edited.groups[1].display_name = 'Rooftop Air Handler';

    const retagged = retagStructure(parseStructure(edited), { 'CS_Filter.pdf': 'cutsheet' });

    expect(retagged.groups[1].display_name).toBe('Rooftop Air Handler');
    expect(retagged.groups[0].display_name).toBe('MAU-5');
  });

  it('rejects tags that are not PREFIX-NUMBER', async () => {
    const structure = await scenario();
    expect(() => retagStructure(structure, { 'CS_Filter.pdf': 'not a tag' })).toThrow(
      StructureValidationError
    );
  });

  it('does not change the original structure', async () => {
    const structure = await scenario();
    const before = serializeStructure(structure);
    retagStructure(structure, { 'AHU-10 - Fan Curve.jpg': 'EF-1' });
    expect(serializeStructure(structure)).toBe(before);
  });
});

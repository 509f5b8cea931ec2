import { describe, it, expect, vi } from 'vitest';
import { OutlineClassifier } from '../../src/core/outline/classifier.js';
import type { LevelAssigner } from '../../src/core/outline/types.js';
import type { PageBlocks, TextBlock } from '../../src/types/outline.js';
import { block } from '../helpers/builders.js';

const BOLD = 'Helvetica-Bold';

const page = (pageNumber: number, blocks: TextBlock[]): PageBlocks => ({
  pageNumber,
  width: 595,
  height: 842,
  blocks
});

const titleBlock = block('Quarterly Review', { top: 100, x0: 160, x1: 435, fontSize: 28 });

describe('OutlineClassifier', () => {
  const classifier = new OutlineClassifier();

  it('returns the no-content result for an empty document', () => {
    expect(classifier.build([])).toEqual({ title: 'No Content Found', outline: [] });
  });

  it('returns an untitled, empty outline when pages carry no blocks', () => {
    expect(classifier.build([page(1, [])])).toEqual({ title: 'Untitled Document', outline: [] });
  });

  it('picks a centered banner as title and keeps it out of the outline', () => {
    const letterLandscape: PageBlocks = {
      pageNumber: 1,
      width: 792,
      height: 612,
      blocks: [
        block('ANNUAL REPORT', { top: 50, x0: 300, x1: 492, fontSize: 24 }),
        block('Revenue grew in every region this year.', { top: 150 }),
        block('Costs were held flat against the prior period.', { top: 200 }),
        block('The board proposes an increased dividend.', { top: 300 })
      ]
    };

    expect(classifier.build([letterLandscape])).toEqual({ title: 'ANNUAL REPORT', outline: [] });
  });

  it('maps the largest sizes to the highest levels', () => {
    const result = classifier.build([
      page(1, [titleBlock]),
      page(2, [
        block('Overview', { top: 100, fontName: BOLD, fontSize: 18, page: 2 }),
        block('Details', { top: 200, fontName: BOLD, fontSize: 14, page: 2 }),
        block('Notes', { top: 300, fontName: BOLD, fontSize: 10, page: 2 })
      ])
    ]);

    expect(result).toEqual({
      title: 'Quarterly Review',
      outline: [
        { level: 'H1', text: 'Overview', page: 2 },
        { level: 'H2', text: 'Details', page: 2 },
        { level: 'H3', text: 'Notes', page: 2 }
      ]
    });
  });

  it('assigns H1 to a lone candidate regardless of size', () => {
    const result = classifier.build([
      page(1, [titleBlock]),
      page(2, [block('Appendix', { top: 120, fontName: BOLD, fontSize: 9, page: 2 })])
    ]);
    expect(result.outline).toEqual([{ level: 'H1', text: 'Appendix', page: 2 }]);
  });

  it('ignores table-of-contents entries', () => {
    const result = classifier.build([
      page(1, [
        titleBlock,
        block('Introduction .......... 5', { top: 200, fontName: BOLD, fontSize: 12 }),
        block('1. Introduction', { top: 300, fontName: BOLD, fontSize: 16 })
      ])
    ]);
    expect(result.outline).toEqual([{ level: 'H1', text: '1. Introduction', page: 1 }]);
  });

  it('excludes header and footer bands from title and headings', () => {
    const result = classifier.build([
      page(1, [
        block('CONFIDENTIAL DRAFT', { top: 20, x0: 200, x1: 395, fontName: BOLD, fontSize: 40 }),
        titleBlock
      ]),
      page(2, [
        block('Running Header', { top: 60, fontName: BOLD, fontSize: 9, page: 2 }),
        block('Findings', { top: 150, fontName: BOLD, fontSize: 16, page: 2 }),
        block('Page footer', { top: 780, fontName: BOLD, fontSize: 9, page: 2 })
      ])
    ]);

    expect(result).toEqual({
      title: 'Quarterly Review',
      outline: [{ level: 'H1', text: 'Findings', page: 2 }]
    });
  });

  it('sorts entries by page, then by vertical position', () => {
    const result = classifier.build([
      page(1, [
        titleBlock,
        block('Later on page one', { top: 500, fontName: BOLD, fontSize: 14 }),
        block('Earlier on page one', { top: 300, fontName: BOLD, fontSize: 14 })
      ]),
      page(2, [block('Page two', { top: 100, fontName: BOLD, fontSize: 18, page: 2 })])
    ]);

    expect(result.outline.map((e) => [e.page, e.text])).toEqual([
      [1, 'Earlier on page one'],
      [1, 'Later on page one'],
      [2, 'Page two']
    ]);
  });

  it('keeps the first block when title scores tie', () => {
    const result = classifier.build([
      page(1, [
        block('First Contender', { top: 100, fontSize: 20 }),
        block('Second Contender', { top: 150, fontSize: 20 })
      ])
    ]);
    expect(result.title).toBe('First Contender');
    expect(result.outline).toEqual([{ level: 'H1', text: 'Second Contender', page: 1 }]);
  });

  it('only considers blocks near the top of page one for the title', () => {
    const result = classifier.build([page(1, [block('Low Banner', { top: 500, fontSize: 30 })])]);
    expect(result).toEqual({
      title: 'Untitled Document',
      outline: [{ level: 'H1', text: 'Low Banner', page: 1 }]
    });
  });

  it('accepts a title block sitting exactly on the top cutoff', () => {
    expect(classifier.build([page(1, [block('Edge Banner', { top: 400, fontSize: 30 })])])).toEqual({
      title: 'Edge Banner',
      outline: []
    });
    expect(classifier.build([page(1, [block('Edge Banner', { top: 400.5, fontSize: 30 })])])).toEqual({
      title: 'Untitled Document',
      outline: [{ level: 'H1', text: 'Edge Banner', page: 1 }]
    });
  });

  it('allows titles of up to 25 words', () => {
    const words = (n: number) => Array.from({ length: n }, (_, i) => `word${i + 1}`).join(' ');

    expect(classifier.build([page(1, [block(words(25), { top: 100, fontSize: 20 })])])).toEqual({
      title: words(25),
      outline: []
    });
    expect(classifier.build([page(1, [block(words(26), { top: 100, fontSize: 20 })])])).toEqual({
      title: 'Untitled Document',
      outline: []
    });
  });

  it('keeps blocks lying exactly on the header and footer band edges', () => {
    // 800 * 0.125 = 100 and 800 * (1 - 0.125) = 700, both exact
    const banded = new OutlineClassifier({ headerZoneRatio: 0.125, footerZoneRatio: 0.125 });
    const result = banded.build([
      {
        pageNumber: 1,
        width: 595,
        height: 800,
        blocks: [block('Quarterly Review', { top: 200, x0: 160, x1: 435, fontSize: 28 })]
      },
      {
        pageNumber: 2,
        width: 595,
        height: 800,
        blocks: [
          block('Inside header', { top: 99.5, fontName: BOLD, fontSize: 12, page: 2 }),
          block('Top edge', { top: 100, fontName: BOLD, fontSize: 12, page: 2 }),
          block('Bottom edge', { top: 700, fontName: BOLD, fontSize: 12, page: 2 }),
          block('Inside footer', { top: 700.5, fontName: BOLD, fontSize: 12, page: 2 })
        ]
      }
    ]);

    expect(result).toEqual({
      title: 'Quarterly Review',
      outline: [
        { level: 'H1', text: 'Top edge', page: 2 },
        { level: 'H1', text: 'Bottom edge', page: 2 }
      ]
    });
  });

  it('replaces newlines in the title', () => {
    const result = classifier.build([page(1, [block('Line one\nLine two', { top: 100, fontSize: 20 })])]);
    expect(result).toEqual({ title: 'Line one Line two', outline: [] });
  });

  it('falls back to the default page size', () => {
    const result = classifier.build([
      { pageNumber: 1, blocks: [titleBlock, block('Footer Note', { top: 800, fontName: BOLD })] }
    ]);
    expect(result).toEqual({ title: 'Quarterly Review', outline: [] });
  });

  it('applies custom zone ratios', () => {
    const noZones = new OutlineClassifier({ headerZoneRatio: 0, footerZoneRatio: 0 });
    const result = noZones.build([
      page(1, [titleBlock, block('Page footer', { top: 800, fontName: BOLD, fontSize: 9 })])
    ]);
    expect(result.outline).toEqual([{ level: 'H1', text: 'Page footer', page: 1 }]);
  });

  it('derives levels from the assigner centers', () => {
    const assigner: LevelAssigner = {
      assign: vi.fn(() => ({ labels: [0, 1], centers: [5, 50] }))
    };
    const result = new OutlineClassifier({}, assigner).build([
      page(1, [
        titleBlock,
        block('Small', { top: 200, fontName: BOLD, fontSize: 12 }),
        block('Big', { top: 300, fontName: BOLD, fontSize: 16 })
      ])
    ]);

    expect(assigner.assign).toHaveBeenCalledWith([12, 16], 2);
    expect(result.outline).toEqual([
      { level: 'H2', text: 'Small', page: 1 },
      { level: 'H1', text: 'Big', page: 1 }
    ]);
  });

  it('degrades to the no-content result when a collaborator throws', () => {
    const reporter = { recordEvent: vi.fn() };
    const failing: LevelAssigner = {
      assign: () => {
        throw new Error('boom');
      }
    };
    const result = new OutlineClassifier({}, failing, reporter).build([
      page(1, [
        titleBlock,
        block('Alpha', { top: 200, fontName: BOLD, fontSize: 12 }),
        block('Beta', { top: 300, fontName: BOLD, fontSize: 16 })
      ])
    ]);

    expect(result).toEqual({ title: 'No Content Found', outline: [] });
    expect(reporter.recordEvent).toHaveBeenCalledWith('error', 'Outline construction failed: boom');
  });

  it('produces identical output on repeated runs', () => {
    const pages = [
      page(1, [
        titleBlock,
        block('Scope', { top: 200, fontName: BOLD, fontSize: 16 }),
        block('Method', { top: 300, fontName: BOLD, fontSize: 13 }),
        block('Data', { top: 400, fontName: BOLD, fontSize: 12.5 }),
        block('Limits', { top: 500, fontName: BOLD, fontSize: 11 })
      ])
    ];
    expect(JSON.stringify(classifier.build(pages))).toBe(JSON.stringify(classifier.build(pages)));
  });
});

import { describe, it, expect } from 'vitest';
import { buildSequenceModel } from './sequence-builder.js';
import { layoutSequence, layoutSequenceWithMaxWidth } from './sequence-layout.js';
import { renderSequence } from './sequence-renderer.js';
import { LayoutError } from '../core/errorBuilder.js';
import { displayWidth } from './utils.js';
import type { SequenceLayout, SequenceModel } from './sequence-types.js';

function model(text: string): SequenceModel {
  const { model, errors } = buildSequenceModel(text);
  if (!model) throw new Error(`parse failed: ${errors.map((e) => e.message).join('; ')}`);
  return model;
}

function draw(text: string): string[] {
  return renderSequence(layoutSequence(model(text))).split('\n');
}

describe('sequence layout', () => {
  it('places participants a minimum gap apart', () => {
    const layout = layoutSequence(model('sequenceDiagram\nAlice->>Bob: Hello'));
    expect(layout.participants.map((p) => [p.left, p.center, p.right])).toEqual([
      [0, 4, 8],
      [11, 14, 17],
    ]);
    expect(layout.width).toBe(18);
  });

  it('widens the gap for a long message', () => {
    const layout = layoutSequence(model('sequenceDiagram\nA->>B: a rather long message'));
    // 21 columns of text plus 4
    expect(layout.participants[1].center - layout.participants[0].center).toBe(25);
  });

  it('fails on a diagram without participants', () => {
    expect(() => layoutSequence({ participants: [], statements: [] })).toThrow(LayoutError);
  });

  it('shrinks gaps and then truncates the longest name to fit a width', () => {
    const layout = layoutSequenceWithMaxWidth(model('sequenceDiagram\nAlice->>Bob: Hello'), 16);
    expect(layout.participants.map((p) => p.name)).toEqual(['Al…', 'Bob']);
    expect(layout.width).toBe(16);
  });

  it('reports the width it needs when no name can shrink further', () => {
    try {
      layoutSequenceWithMaxWidth(model('sequenceDiagram\nA->>B: hi'), 5);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LayoutError);
      if (e instanceof LayoutError) expect(e.code).toBe('TOO_WIDE');
    }
  });
});

describe('renderSequence', () => {
  it('draws boxes, lifelines and a message', () => {
    expect(draw('sequenceDiagram\nAlice->>Bob: Hello')).toEqual([
      '┌───────┐  ┌─────┐',
      '│ Alice │  │ Bob │',
      '└───┬───┘  └──┬──┘',
      '    │ Hello   │',
      '    │────────>│',
      '    │         │',
      '┌───┴───┐  ┌──┴──┐',
      '│ Alice │  │ Bob │',
      '└───────┘  └─────┘',
    ]);
  });

  it('draws active lifelines heavy, including the row that deactivates', () => {
    const lines = draw('sequenceDiagram\nA->>+B: go\nB-->>-A: done');
    expect(lines[3]).toBe('  │ go      ┃');
    expect(lines[4]).toBe('  │────────>┃');
    expect(lines[7]).toBe('  │< ─ ─ ─ ─┃');
  });

  it('draws a note to the right of a lifeline', () => {
    const lines = draw('sequenceDiagram\nparticipant A\nnote right of A: hi');
    expect(lines.slice(3, 6)).toEqual([
      '  │ ┌────┐',
      '  │ │ hi │',
      '  │ └────┘',
    ]);
  });

  it('frames a loop and crosses lifelines on its closing row', () => {
    const lines = draw('sequenceDiagram\nloop every minute\nA->>B: ping\nend');
    expect(lines.slice(3, 8)).toEqual([
      '┌─loop every minute─┐',
      '│ │ ping    │       │',
      '│ │────────>│       │',
      '│ │         │       │',
      '└─┼─────────┼───────┘',
    ]);
  });

  it('numbers messages when autonumber is present', () => {
    const lines = draw('sequenceDiagram\nautonumber\nA->>B: hi');
    expect(lines[3]).toBe('  │ 1. hi   │');
  });

  it('draws a self-message as a loop to the right of the lifeline', () => {
    expect(draw('sequenceDiagram\nA->>A: me').slice(3, 6)).toEqual([
      '  │ me',
      '  │───┐',
      '  │<──┘',
    ]);
  });

  it('draws divider rows for alt and else', () => {
    expect(draw('sequenceDiagram\nalt ok\nA->>B: yes\nelse fails\nA->>B: no\nend').slice(3, 12)).toEqual([
      '┌─alt ok────┼─┐',
      '│ │ yes     │ │',
      '│ │────────>│ │',
      '│ │         │ │',
      '├─else fails┼─┤',
      '│ │ no      │ │',
      '│ │────────>│ │',
      '│ │         │ │',
      '└─┼─────────┼─┘',
    ]);
  });

  it('marks a destroyed participant and leaves out its bottom box', () => {
    expect(draw('sequenceDiagram\nA->>B: bye\ndestroy B').slice(6)).toEqual([
      '  │         ●',
      '┌─┴─┐',
      '│ A │',
      '└───┘',
    ]);
  });

  it('spans a note over two participants', () => {
    expect(draw('sequenceDiagram\nA->>B: hi\nnote over A,B: both').slice(6, 9)).toEqual([
      ' ┌───────────┐',
      ' │ both      │',
      ' └───────────┘',
    ]);
  });

  it('draws a note to the left of a lifeline', () => {
    expect(draw('sequenceDiagram\nparticipant A\nparticipant B\nnote left of B: hi').slice(3, 6)).toEqual([
      '  │  ┌────┐ │',
      '  │  │ hi │ │',
      '  │  └────┘ │',
    ]);
  });

  it('keeps the sides of an outer frame on the rows of an inner one', () => {
    const text = 'sequenceDiagram\nloop outer\nopt inner\nA->>B: hi\nend\nA->>B: after\nend';
    expect(draw(text).slice(3, 13)).toEqual([
      '┌─loop outer┼─┐',
      '│┌─opt inner┼┐│',
      '│││ hi      │││',
      '│││────────>│││',
      '│││         │││',
      '│└┼─────────┼┘│',
      '│ │ after   │ │',
      '│ │────────>│ │',
      '│ │         │ │',
      '└─┼─────────┼─┘',
    ]);
  });
});

describe('frame containment', () => {
  it('widens a frame around a self-message on the last participant', () => {
    expect(draw('sequenceDiagram\nloop tick\nA->>B: x\nB->>B: thinking hard\nend').slice(3, 11)).toEqual([
      '┌─loop tick─┼───────────────┐',
      '│ │ x       │               │',
      '│ │────────>│               │',
      '│ │         │               │',
      '│ │         │ thinking hard │',
      '│ │         │───┐           │',
      '│ │         │<──┘           │',
      '└─┼─────────┼───────────────┘',
    ]);
  });

  it('widens a frame around a note left of the first participant', () => {
    const lines = draw('sequenceDiagram\nopt o\nnote left of A: long note here');
    expect(lines[0]).toBe('                   ┌───┐');
    expect(lines.slice(3, 8)).toEqual([
      '┌─opt o──────────────┼─┐',
      '│ ┌────────────────┐ │ │',
      '│ │ long note here │ │ │',
      '│ └────────────────┘ │ │',
      '└────────────────────┼─┘',
    ]);
  });
});

describe('width budget', () => {
  const diagrams = [
    'sequenceDiagram\nAlice->>Bob: Hello',
    'sequenceDiagram\nparticipant Customer\nparticipant Warehouse\nparticipant Courier\nCustomer->>Warehouse: place an order\nWarehouse->>Courier: hand over parcel\nCourier-->>Customer: delivered',
    'sequenceDiagram\nloop every minute\nClient->>Server: poll for updates\nServer->>Server: check queue\nend',
    'sequenceDiagram\nparticipant Alice\nparticipant Bob\nnote over Alice,Bob: shared context\nAlice->>Bob: ok',
  ];

  it('never exceeds the budget when layout succeeds', () => {
    for (const text of diagrams) {
      for (const maxWidth of [10, 16, 24, 32, 48]) {
        let layout: SequenceLayout;
        try {
          layout = layoutSequenceWithMaxWidth(model(text), maxWidth);
        } catch (e) {
          expect(e).toBeInstanceOf(LayoutError);
          continue;
        }
        expect(layout.width).toBeLessThanOrEqual(maxWidth);
        for (const line of renderSequence(layout).split('\n')) {
          expect(displayWidth(line)).toBeLessThanOrEqual(maxWidth);
        }
      }
    }
  });
});

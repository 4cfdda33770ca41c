/**
 * eventText.ts
 *
 * Parses the rich-text blob of one timetable block, e.g.
 *
 *   <div class="eventText"><b>Algorithms</b><br>B204<br>Dr Martin<br>TD1<br>Bring laptop<br></div>
 *
 * into labeled segments. The source always emits the fields in this order:
 * course, room, instructor, zero or more group tags, notes.
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { MalformedEventTextError } from './errors';
import type { EventRecord } from './types';

const TEXT = '#text';
const ATTRS = ':@';

export const MIN_SEGMENTS = 4;

const EventRecordSchema = z.object({
  course: z.string().min(1),
  room: z.string().min(1),
  instructor: z.string().min(1),
  groups: z.array(z.string().min(1)),
  notes: z.string().min(1),
});

// Ordered output keeps text and <br> in document order; tag values stay strings.
export function makeFragmentParser() {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: TEXT,
    preserveOrder: true,
    unpairedTags: ['br'],
    trimValues: false,
    parseTagValue: false,
    processEntities: true,
    htmlEntities: true,
  });
}

const fragmentParser = makeFragmentParser();

type FragmentNode = Record<string, unknown>;

function isNode(value: unknown): value is FragmentNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tagOf(node: FragmentNode): string | undefined {
  return Object.keys(node).find((k) => k !== ATTRS && k !== TEXT);
}

function childrenOf(node: FragmentNode, tag: string): unknown[] {
  const children = node[tag];
  return Array.isArray(children) ? children : [];
}

function classOf(node: FragmentNode): string {
  const attrs = node[ATTRS];
  if (!isNode(attrs)) return '';
  const cls = attrs['@_class'];
  return typeof cls === 'string' ? cls : '';
}

function findEventText(nodes: unknown[]): unknown[] | null {
  for (const node of nodes) {
    if (!isNode(node)) continue;
    const tag = tagOf(node);
    if (!tag) continue;
    if (classOf(node).split(/\s+/).includes('eventText')) return childrenOf(node, tag);
    const nested = findEventText(childrenOf(node, tag));
    if (nested) return nested;
  }
  return null;
}

type SegmentState = {
  out: string[];
  text: string;
  // set after the title; the <br> that ends the title line is not a field
  afterTitle: boolean;
};

function isBlank(text: string): boolean {
  return text.trim() === '';
}

// One segment per <br>-terminated run; the bold title always stands alone.
function collectSegments(nodes: unknown[], state: SegmentState): void {
  for (const node of nodes) {
    if (!isNode(node)) continue;

    if (TEXT in node) {
      state.text += String(node[TEXT]);
      continue;
    }

    const tag = tagOf(node);
    if (!tag) continue;

    if (tag === 'br') {
      if (!(state.afterTitle && isBlank(state.text))) state.out.push(state.text);
      state.text = '';
      state.afterTitle = false;
    } else if (tag === 'b' || tag === 'strong') {
      if (!isBlank(state.text)) state.out.push(state.text);
      state.text = '';
      collectSegments(childrenOf(node, tag), state);
      state.out.push(state.text);
      state.text = '';
      state.afterTitle = true;
    } else {
      collectSegments(childrenOf(node, tag), state);
    }
  }
}

function normalize(segment: string): string {
  return segment.replace(/\s+/g, ' ').trim();
}

// Empty fields between separators are kept, so a missing value fails validation
// instead of shifting later fields into its slot.
export function splitEventSegments(textBlob: string): string[] {
  let nodes: unknown;
  try {
    nodes = fragmentParser.parse(textBlob);
  } catch (err) {
    throw new MalformedEventTextError('event text is not parseable markup', [], { cause: err });
  }
  if (!Array.isArray(nodes)) return [];

  const root = findEventText(nodes) ?? nodes;
  const state: SegmentState = { out: [], text: '', afterTitle: false };
  collectSegments(root, state);
  if (!isBlank(state.text)) state.out.push(state.text);

  return state.out.map(normalize);
}

export function labelSegments(segments: string[]): EventRecord {
  if (segments.length < MIN_SEGMENTS) {
    throw new MalformedEventTextError(
      `expected at least ${MIN_SEGMENTS} segments (course, room, instructor, notes), got ${segments.length}`,
      segments,
    );
  }

  const [course, room, instructor, ...rest] = segments;
  const notes = rest[rest.length - 1];
  const groups = rest.slice(0, -1);

  const parsed = EventRecordSchema.safeParse({ course, room, instructor, groups, notes });
  if (!parsed.success) {
    throw new MalformedEventTextError(`event text failed validation: ${parsed.error.message}`, segments);
  }
  return parsed.data;
}

export function parseEventText(textBlob: string): EventRecord {
  return labelSegments(splitEventSegments(textBlob));
}

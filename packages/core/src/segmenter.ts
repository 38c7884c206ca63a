import type { XmlElement, XmlNode } from "./types.js";
import { createElement, findAll, getAttr, hasTag, localName, replaceBody, requireBody } from "./xml.js";

/**
 * Where an element attaches when a body is cut into segments:
 * PREV joins the segment before it, CURRENT anchors its own segment,
 * NEXT waits for the segment that follows it.
 */
export const SegmentPosition = {
  PREV: -1,
  CURRENT: 0,
  NEXT: 1,
} as const;

export type SegmentPosition = (typeof SegmentPosition)[keyof typeof SegmentPosition];

/** Ignored tags that belong with the following segment rather than the preceding one. */
export const PREFIX_TAGS: ReadonlySet<string> = new Set(["divGen"]);

export const SEGMENT_TAG = "seg";
export const SEGMENT_MARKER_TYPE = "seg";

export interface SegmentLabel {
  type: string;
  n: string;
}

export interface SegmenterState {
  position: SegmentPosition;
  queue: XmlNode[];
  label: SegmentLabel | null;
  ordinals: ReadonlyMap<string, number>;
}

export const INITIAL_SEGMENTER_STATE: SegmenterState = {
  position: SegmentPosition.NEXT,
  queue: [],
  label: null,
  ordinals: new Map(),
};

export function positionOf(node: XmlNode, ignoredTags: ReadonlySet<string>): SegmentPosition {
  if (typeof node === "string") {
    return SegmentPosition.PREV;
  }
  const tag = localName(node.tag);
  if (!ignoredTags.has(tag)) {
    return SegmentPosition.CURRENT;
  }
  return PREFIX_TAGS.has(tag) ? SegmentPosition.NEXT : SegmentPosition.PREV;
}

/** Boundary rule: a later attachment point, or two substantive elements back to back. */
export function opensSegment(previous: SegmentPosition, current: SegmentPosition): boolean {
  return current > previous || (current === SegmentPosition.CURRENT && previous === SegmentPosition.CURRENT);
}

export function createSegment(label: SegmentLabel | null, children: XmlNode[]): XmlElement {
  return createElement(SEGMENT_TAG, { type: label?.type ?? "", n: label?.n ?? "" }, children);
}

export interface SegmenterStep {
  state: SegmenterState;
  /** Segment sealed by this step, if the element opened a new one. */
  sealed: XmlElement | null;
}

/** Feeds one body node through the transducer. */
export function stepSegmenter(state: SegmenterState, node: XmlNode, ignoredTags: ReadonlySet<string>): SegmenterStep {
  const position = positionOf(node, ignoredTags);
  const opens = opensSegment(state.position, position);
  const sealed = opens ? createSegment(state.label, state.queue) : null;

  let ordinals = state.ordinals;
  let label = opens ? null : state.label;
  if (position === SegmentPosition.CURRENT && typeof node !== "string") {
    const tag = localName(node.tag);
    const ordinal = (ordinals.get(tag) ?? -1) + 1;
    ordinals = new Map(ordinals).set(tag, ordinal);
    label = { type: tag, n: String(ordinal) };
  }

  return {
    state: {
      position,
      queue: opens ? [node] : [...state.queue, node],
      label,
      ordinals,
    },
    sealed,
  };
}

/** Cuts a flat body into segments, each holding at most one substantive element. */
export function segmentBody(children: XmlNode[], ignoredTags: ReadonlySet<string>): XmlElement[] {
  const segments: XmlElement[] = [];
  let state = INITIAL_SEGMENTER_STATE;
  for (const child of children) {
    const step = stepSegmenter(state, child, ignoredTags);
    if (step.sealed) {
      segments.push(step.sealed);
    }
    state = step.state;
  }
  if (state.queue.length > 0) {
    segments.push(createSegment(state.label, state.queue));
  }
  return segments;
}

/** Inverse of {@link segmentBody}: splices every segment's children back in order. */
export function desegmentBody(children: XmlNode[]): XmlNode[] {
  const out: XmlNode[] = [];
  for (const child of children) {
    if (hasTag(child, SEGMENT_TAG)) {
      out.push(...child.children);
    } else {
      out.push(child);
    }
  }
  return out;
}

export function segmentDocument(document: XmlElement, ignoredTags: Iterable<string>): XmlElement {
  const body = requireBody(document);
  return replaceBody(document, segmentBody(body.children, new Set(ignoredTags)));
}

export function desegmentDocument(document: XmlElement): XmlElement {
  const body = requireBody(document);
  return replaceBody(document, desegmentBody(body.children));
}

export function isSegmentMarker(node: XmlNode): node is XmlElement {
  return hasTag(node, "divGen") && getAttr(node, "type") === SEGMENT_MARKER_TYPE;
}

export function countSegmentMarkers(element: XmlElement): number {
  return findAll(element, "divGen").filter(isSegmentMarker).length;
}

/** Splits at each top-level `<divGen type="seg"/>`; the markers are consumed, so n markers give n+1 segments. */
export function segmentAtMarkers(children: XmlNode[]): XmlElement[] {
  const segments: XmlElement[] = [];
  let current: XmlNode[] = [];
  for (const child of children) {
    if (isSegmentMarker(child)) {
      segments.push(createElement(SEGMENT_TAG, {}, current));
      current = [];
      continue;
    }
    current.push(child);
  }
  segments.push(createElement(SEGMENT_TAG, {}, current));
  return segments;
}

/**
 * PDF Outline (Bookmarks)
 *
 * pdf-lib has no outline API, so the outline dictionaries are written into
 * the document's object graph directly. Every item is left open.
 */

import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRef,
  PDFString,
  type PDFContext,
} from 'pdf-lib';
import type { OutlineNode } from '../types';

interface WrittenLevel {
  first: PDFRef;
  last: PDFRef;
  /** Visible items at this level and below */
  count: number;
}

function writeLevel(
  context: PDFContext,
  nodes: readonly OutlineNode[],
  parentRef: PDFRef,
  pageRefs: readonly PDFRef[]
): WrittenLevel {
  const refs = nodes.map(() => context.nextRef());
  let count = nodes.length;

  nodes.forEach((node, i) => {
    const pageRef = pageRefs[node.page_index];
    if (pageRef === undefined) {
      throw new RangeError(
        `Outline item "${node.label}" targets page ${node.page_index} of ${pageRefs.length}`
      );
    }

    const item = context.obj({
      Title: PDFHexString.fromText(node.label),
      Parent: parentRef,
      Dest: [pageRef, 'XYZ', null, null, null],
    });
    if (i > 0) item.set(PDFName.of('Prev'), refs[i - 1]);
    if (i < refs.length - 1) item.set(PDFName.of('Next'), refs[i + 1]);

    if (node.children.length > 0) {
      const children = writeLevel(context, node.children, refs[i], pageRefs);
      item.set(PDFName.of('First'), children.first);
      item.set(PDFName.of('Last'), children.last);
      item.set(PDFName.of('Count'), PDFNumber.of(children.count));
      count += children.count;
    }

    context.assign(refs[i], item);
  });

  return { first: refs[0], last: refs[refs.length - 1], count };
}

/**
 * Attach an outline tree to the document catalog.
 */
export function writeOutline(doc: PDFDocument, nodes: readonly OutlineNode[]): void {
  if (nodes.length === 0) return;

  const { context } = doc;
  const pageRefs = doc.getPages().map((page) => page.ref);
  const rootRef = context.nextRef();
  const level = writeLevel(context, nodes, rootRef, pageRefs);

  const root = context.obj({
    Type: 'Outlines',
    First: level.first,
    Last: level.last,
    Count: level.count,
  });
  context.assign(rootRef, root);

  doc.catalog.set(PDFName.of('Outlines'), rootRef);
  doc.catalog.set(PDFName.of('PageMode'), PDFName.of('UseOutlines'));
}

function readLevel(parent: PDFDict, pageIndexByRef: Map<string, number>): OutlineNode[] {
  const nodes: OutlineNode[] = [];
  let current = parent.lookupMaybe(PDFName.of('First'), PDFDict);

  while (current) {
    const title = current.lookupMaybe(PDFName.of('Title'), PDFString, PDFHexString);
    const dest = current.lookupMaybe(PDFName.of('Dest'), PDFArray);
    const target = dest && dest.size() > 0 ? dest.get(0) : undefined;

    nodes.push({
      label: title ? title.decodeText() : '',
      page_index: target instanceof PDFRef ? pageIndexByRef.get(target.toString()) ?? -1 : -1,
      children: readLevel(current, pageIndexByRef),
    });

    current = current.lookupMaybe(PDFName.of('Next'), PDFDict);
  }

  return nodes;
}

/**
 * Read the outline tree back from a document. Targets that are not pages of
 * the document come back as -1.
 */
export function readOutline(doc: PDFDocument): OutlineNode[] {
  const root = doc.catalog.lookupMaybe(PDFName.of('Outlines'), PDFDict);
  if (!root) return [];

  const pageIndexByRef = new Map(
    doc.getPages().map((page, index) => [page.ref.toString(), index] as const)
  );
  return readLevel(root, pageIndexByRef);
}

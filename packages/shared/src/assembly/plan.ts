/**
 * Assembly Plan
 *
 * Frozen view over a structure plus the PDFs produced for it outside the
 * core: rendered documents keyed by input path, title pages keyed by tag
 * (CUTSHEET for the cut-sheets section).
 */

import type { AssemblyPlan, Structure } from '../types';

type PathMap = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

function isMap(map: PathMap): map is ReadonlyMap<string, string> {
  return map instanceof Map;
}

function toRecord(map: PathMap): Readonly<Record<string, string>> {
  const entries = isMap(map) ? Array.from(map.entries()) : Object.entries(map);
  return Object.freeze(Object.fromEntries(entries));
}

export function createAssemblyPlan(
  structure: Structure,
  rendered: PathMap,
  titlePages: PathMap = {}
): AssemblyPlan {
  return Object.freeze({
    structure,
    rendered: toRecord(rendered),
    title_pages: toRecord(titlePages),
  });
}

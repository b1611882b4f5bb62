import { v4 as uuidv4 } from 'uuid';

export type IdKind = 'infra' | 'report';

/** Prefixed v4 UUID, e.g. `report_9b2f0c1e-...`. */
export function generateId(kind: IdKind): string {
  return `${kind}_${uuidv4()}`;
}

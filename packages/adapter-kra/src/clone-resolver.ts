/**
 * @module clone-resolver
 * Replaces clone placeholders with clone layers pointing at their targets.
 *
 * Runs once, after the whole tree is built. Targets are looked up by UUID
 * over the finished draft tree (masks included), so a clone may refer to a
 * layer that appears after it. Chained clones resolve through each other;
 * a chain that returns to a node still being resolved is a cycle.
 */

import type { MaskLayer, NodeLayer } from '@kra-decoder/types';
import { KraDocumentError } from './errors';
import type { DraftLayer } from './layer-builder';

type DraftNode = DraftLayer | MaskLayer;

/**
 * Resolve every clone placeholder in a draft forest.
 *
 * @param drafts - Top-level draft layers.
 * @returns The finished forest. Groups and clones are new objects; other
 *   layers are reused as built.
 * @throws {KraDocumentError} `unresolved-clone` when a target UUID is not in
 *   the tree, `clone-cycle` when clones refer back to themselves.
 */
export function resolveClones(drafts: DraftLayer[]): NodeLayer[] {
  const byUuid = indexByUuid(drafts);
  const resolved = new Map<DraftLayer, NodeLayer>();
  const inProgress = new Set<DraftLayer>();

  const finalize = (draft: DraftLayer): NodeLayer => {
    const done = resolved.get(draft);
    if (done) return done;

    if (inProgress.has(draft)) {
      throw new KraDocumentError(
        'clone-cycle',
        `Clone reference cycle through layer "${draft.name}" (${draft.uuid})`,
      );
    }
    inProgress.add(draft);

    let layer: NodeLayer;
    switch (draft.type) {
      case 'group':
        // Children first: post-order.
        layer = { ...draft, children: draft.children.map(finalize) };
        break;
      case 'clone-placeholder': {
        const target = byUuid.get(draft.cloneFromUuid);
        if (!target) {
          throw new KraDocumentError(
            'unresolved-clone',
            `Clone layer "${draft.name}" refers to missing layer ${draft.cloneFromUuid || '(none)'}`,
          );
        }
        const { type: _placeholder, ...fields } = draft;
        layer = {
          ...fields,
          type: 'clone',
          target: isMask(target) ? target : finalize(target),
        };
        break;
      }
      default:
        layer = draft;
    }

    inProgress.delete(draft);
    resolved.set(draft, layer);
    return layer;
  };

  return drafts.map(finalize);
}

/**
 * Map every UUID in the draft tree to its node.
 * The first node wins when a document repeats a UUID.
 */
function indexByUuid(drafts: DraftLayer[]): Map<string, DraftNode> {
  const index = new Map<string, DraftNode>();
  const visit = (node: DraftNode): void => {
    if (node.uuid && !index.has(node.uuid)) index.set(node.uuid, node);
    if (isMask(node)) return;
    node.masks.forEach(visit);
    if (node.type === 'group') node.children.forEach(visit);
  };
  drafts.forEach(visit);
  return index;
}

function isMask(node: DraftNode): node is MaskLayer {
  return node.type.endsWith('-mask');
}

/**
 * History tree builder
 *
 * The history markup nests `<Node>` elements: the root is the current
 * sequence and each child is a state it was derived from. Nodes go into an
 * arena in pre-order, with parents holding their children's arena indices.
 * Construction uses an explicit stack so tree depth is bounded only by
 * `maxHistoryDepth`, never by the call stack.
 */

import { CyclicHistoryError, MalformedBlockError, NestingTooDeepError } from "../../errors";
import type { WarningHandler } from "../../types";
import { DEFAULT_MAX_HISTORY_DEPTH } from "./constants";
import { childrenNamed, findElement } from "./markup";
import type { HistoryNode, HistoryOperation, HistoryTree, MarkupElement } from "./types";

const NODE = "Node";
const TREE = "HistoryTree";

/**
 * Cloning operations SnapGene records on history nodes. "invalid" marks
 * imported or leaf states that were not produced by an operation.
 */
export const KNOWN_OPERATIONS: ReadonlySet<string> = new Set([
  "invalid",
  "makeNewFile",
  "newFileFromSelection",
  "importedFile",
  "insertFragment",
  "insertFragments",
  "replace",
  "insertBases",
  "deleteBases",
  "replaceBases",
  "changeMethylation",
  "changePhosphorylation",
  "changeTopology",
  "changeStrandedness",
  "flipOrientation",
  "reverseComplement",
  "amplifyFragment",
  "pcr",
  "overlapExtensionPCR",
  "primerDirectedMutagenesis",
  "restrictionCloning",
  "ligateFragments",
  "annealOligos",
  "gatewayBPCloning",
  "gatewayLRCloning",
  "gibsonAssembly",
  "hifiAssembly",
  "inFusionCloning",
  "goldenGateAssembly",
  "taCloning",
  "topoCloning",
  "ligationIndependentCloning",
]);

export interface HistoryTreeOptions {
  maxHistoryDepth?: number;
  onWarning?: WarningHandler;
}

export function parseOperation(value: string | undefined): HistoryOperation {
  const name = value ?? "invalid";
  return KNOWN_OPERATIONS.has(name) ? { kind: "known", name } : { kind: "other", name };
}

function parseId(element: MarkupElement): number {
  const raw = element.attributes["ID"];
  const id = raw === undefined ? Number.NaN : Number(raw);
  if (!Number.isInteger(id)) {
    throw new MalformedBlockError(
      `History node '${element.attributes["name"] ?? ""}' has no integer ID attribute`,
      raw === undefined ? undefined : `ID="${raw}"`
    );
  }
  return id;
}

function toNode(element: MarkupElement, index: number, id: number): HistoryNode {
  const attrs = element.attributes;
  return {
    index,
    id,
    name: attrs["name"] ?? "",
    type: attrs["type"] ?? "",
    seqLen: Number.parseInt(attrs["seqLen"] ?? "0", 10) || 0,
    topology: attrs["circular"] === "1" ? "circular" : "linear",
    strandedness: attrs["strandedness"] === "single" ? "single" : "double",
    operation: parseOperation(attrs["operation"]),
    upstreamModification: attrs["upstreamModification"],
    downstreamModification: attrs["downstreamModification"],
    resurrectable: attrs["resurrectable"] === "1",
    children: [],
    inputSummaries: childrenNamed(element, "InputSummary"),
    oligos: childrenNamed(element, "Oligo"),
    parameters: childrenNamed(element, "Parameter"),
    attributes: attrs,
  };
}

type StackItem =
  | { kind: "enter"; element: MarkupElement; parent: number | undefined; depth: number }
  | { kind: "leave"; id: number };

function isElement(markup: MarkupElement | readonly MarkupElement[]): markup is MarkupElement {
  return !Array.isArray(markup);
}

function findRoot(markup: MarkupElement | readonly MarkupElement[]): MarkupElement {
  const roots: readonly MarkupElement[] = isElement(markup) ? [markup] : markup;
  const tree = findElement(roots, TREE);
  const root = tree === undefined ? findElement(roots, NODE) : childrenNamed(tree, NODE)[0];
  if (root === undefined) {
    throw new MalformedBlockError("History markup contains no <Node> element");
  }
  return root;
}

/**
 * Build the arena from history markup
 *
 * @throws {CyclicHistoryError} If a node repeats the ID of one of its ancestors
 * @throws {NestingTooDeepError} If the tree is deeper than `maxHistoryDepth`
 * @throws {MalformedBlockError} If there is no node or a node lacks an integer ID
 */
export function buildHistoryTree(
  markup: MarkupElement | readonly MarkupElement[],
  options: HistoryTreeOptions = {}
): HistoryTree {
  const maxDepth = options.maxHistoryDepth ?? DEFAULT_MAX_HISTORY_DEPTH;
  const onWarning = options.onWarning ?? (() => undefined);

  const nodes: HistoryNode[] = [];
  const byId = new Map<number, number>();

  // IDs from the root down to the node being visited
  const path: number[] = [];
  const onPath = new Set<number>();

  const stack: StackItem[] = [{ kind: "enter", element: findRoot(markup), parent: undefined, depth: 1 }];

  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;
    if (item.kind === "leave") {
      path.pop();
      onPath.delete(item.id);
      continue;
    }
    if (item.depth > maxDepth) {
      throw new NestingTooDeepError(maxDepth, "history");
    }

    const id = parseId(item.element);
    if (onPath.has(id)) {
      throw new CyclicHistoryError(id, [...path]);
    }

    const index = nodes.length;
    nodes.push(toNode(item.element, index, id));
    if (item.parent !== undefined) {
      nodes[item.parent]?.children.push(index);
    }

    if (byId.has(id)) {
      onWarning(`History node ID ${id} appears more than once; keeping the first occurrence`);
    } else {
      byId.set(id, index);
    }

    path.push(id);
    onPath.add(id);
    stack.push({ kind: "leave", id });

    // Reverse so the leftmost child is popped first
    const children = childrenNamed(item.element, NODE);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) {
        stack.push({ kind: "enter", element: child, parent: index, depth: item.depth + 1 });
      }
    }
  }

  return { nodes, root: 0, byId };
}

/**
 * Pre-order traversal: root first, then each child subtree left to right
 */
export function walkHistory(tree: HistoryTree): HistoryNode[] {
  const visited: HistoryNode[] = [];
  const seen = new Set<number>();
  const stack = [tree.root];

  while (stack.length > 0) {
    const index = stack.pop();
    if (index === undefined || seen.has(index)) continue;
    const node = tree.nodes[index];
    if (node === undefined) continue;

    seen.add(index);
    visited.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child !== undefined) {
        stack.push(child);
      }
    }
  }

  return visited;
}

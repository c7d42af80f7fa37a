/**
 * Tests for the history tree builder
 */

import { describe, expect, test, vi } from "vitest";
import { compress as xzCompress } from "../../../src/compression/xz";
import {
  CyclicHistoryError,
  MalformedBlockError,
  NestingTooDeepError,
} from "../../../src/errors";
import { getHistoryTree, parseSnapGene } from "../../../src/formats/sgff";
import { buildHistoryTree, parseOperation, walkHistory } from "../../../src/formats/sgff/history-tree";
import { parseMarkup } from "../../../src/formats/sgff/markup";
import type { MarkupElement } from "../../../src/formats/sgff/types";
import { ascii, block, snapgeneFile } from "../../utils/sgff-builders";

const quiet = () => undefined;

function treeOf(xml: string, maxHistoryDepth?: number) {
  return buildHistoryTree(parseMarkup(xml), { maxHistoryDepth, onWarning: quiet });
}

/** A chain of `depth` nodes, each the only child of the one before */
function chain(depth: number): string {
  let xml = "";
  for (let i = 0; i < depth; i++) xml += `<Node ID="${i}" name="n${i}">`;
  for (let i = 0; i < depth; i++) xml += "</Node>";
  return `<HistoryTree>${xml}</HistoryTree>`;
}

/** The same chain as element objects, skipping the XML parser */
function chainElements(depth: number): MarkupElement {
  let node: MarkupElement = { name: "Node", attributes: { ID: String(depth - 1) }, children: [], text: "" };
  for (let i = depth - 2; i >= 0; i--) {
    node = { name: "Node", attributes: { ID: String(i) }, children: [node], text: "" };
  }
  return { name: "HistoryTree", attributes: {}, children: [node], text: "" };
}

describe("buildHistoryTree", () => {
  test("builds a pre-order arena", () => {
    const tree = treeOf(
      `<HistoryTree>
         <Node ID="2" name="A" operation="insertFragment" seqLen="100" circular="1">
           <Node ID="1" name="B" operation="invalid"/>
           <Node ID="0" name="C" type="DNA" strandedness="single" resurrectable="1"/>
         </Node>
       </HistoryTree>`
    );

    expect(tree.root).toBe(0);
    expect(tree.nodes.map((node) => node.name)).toEqual(["A", "B", "C"]);
    expect(tree.nodes[0]?.children).toEqual([1, 2]);
    expect(tree.nodes[0]?.seqLen).toBe(100);
    expect(tree.nodes[0]?.topology).toBe("circular");
    expect(tree.nodes[0]?.strandedness).toBe("double");
    expect(tree.nodes[2]?.strandedness).toBe("single");
    expect(tree.nodes[2]?.resurrectable).toBe(true);
    expect(tree.byId.get(0)).toBe(2);
    expect(walkHistory(tree).map((node) => node.name)).toEqual(["A", "B", "C"]);
  });

  test("visits the leftmost subtree before later siblings", () => {
    const tree = treeOf(
      `<HistoryTree><Node ID="1" name="A"><Node ID="2" name="B"><Node ID="3" name="D"/></Node><Node ID="4" name="C"/></Node></HistoryTree>`
    );
    expect(walkHistory(tree).map((node) => node.name)).toEqual(["A", "B", "D", "C"]);
    expect(tree.nodes[1]?.children).toEqual([2]);
  });

  test("collects input summaries, oligos and parameters", () => {
    const tree = treeOf(
      `<HistoryTree><Node ID="5" name="pcr product" operation="amplifyFragment">
         <InputSummary manipulation="amplify" val1="10" val2="90"/>
         <Oligo name="fwd" sequence="ACGTAC"/>
         <Oligo name="rev" sequence="TTGACC"/>
         <Parameter name="polymerase" val="Q5"/>
       </Node></HistoryTree>`
    );
    const node = tree.nodes[0];

    expect(node?.operation).toEqual({ kind: "known", name: "amplifyFragment" });
    expect(node?.inputSummaries[0]?.attributes).toEqual({ manipulation: "amplify", val1: "10", val2: "90" });
    expect(node?.oligos.map((oligo) => oligo.attributes["name"])).toEqual(["fwd", "rev"]);
    expect(node?.parameters[0]?.attributes["val"]).toBe("Q5");
  });

  test("takes the first node when there is no HistoryTree wrapper", () => {
    const tree = treeOf(`<Wrapper><Node ID="9" name="only"/></Wrapper>`);
    expect(tree.nodes.map((node) => node.id)).toEqual([9]);
  });

  test("rejects a node that repeats an ancestor's ID", () => {
    let caught: unknown;
    try {
      treeOf(`<HistoryTree><Node ID="1"><Node ID="2"><Node ID="1"/></Node></Node></HistoryTree>`);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CyclicHistoryError);
    if (!(caught instanceof CyclicHistoryError)) return;
    expect(caught.nodeId).toBe(1);
    expect(caught.ancestry).toEqual([1, 2]);
  });

  test("checks cycles against the current path only", () => {
    const onWarning = vi.fn();
    let caught: unknown;
    try {
      buildHistoryTree(
        parseMarkup(
          `<HistoryTree><Node ID="1"><Node ID="2"><Node ID="3"/></Node><Node ID="3"><Node ID="2"><Node ID="1"/></Node></Node></Node></HistoryTree>`
        ),
        { onWarning }
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CyclicHistoryError);
    if (!(caught instanceof CyclicHistoryError)) return;
    expect(caught.nodeId).toBe(1);
    expect(caught.ancestry).toEqual([1, 3, 2]);
    expect(onWarning).toHaveBeenCalledTimes(2);
  });

  test("builds a chain at the default depth limit", () => {
    const tree = buildHistoryTree(chainElements(4096), { onWarning: quiet });
    expect(tree.nodes).toHaveLength(4096);
    expect(tree.nodes[4095]?.id).toBe(4095);
    expect(tree.byId.get(4095)).toBe(4095);
  });

  test("warns about a repeated ID outside the ancestry and keeps the first", () => {
    const onWarning = vi.fn();
    const tree = buildHistoryTree(
      parseMarkup(`<HistoryTree><Node ID="1"><Node ID="2" name="first"/><Node ID="2" name="second"/></Node></HistoryTree>`),
      { onWarning }
    );

    expect(tree.nodes).toHaveLength(3);
    expect(tree.byId.get(2)).toBe(1);
    expect(onWarning).toHaveBeenCalledWith("History node ID 2 appears more than once; keeping the first occurrence");
  });

  test("enforces the history depth limit", () => {
    expect(treeOf(chain(5), 5).nodes).toHaveLength(5);

    let caught: unknown;
    try {
      treeOf(chain(6), 5);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NestingTooDeepError);
    expect(caught instanceof NestingTooDeepError && caught.structure).toBe("history");
  });

  test("builds deep chains without recursion", () => {
    const tree = treeOf(chain(3000));
    expect(tree.nodes).toHaveLength(3000);
    expect(walkHistory(tree)).toHaveLength(3000);
    expect(tree.nodes[2999]?.name).toBe("n2999");
  });

  test("rejects nodes without an integer ID", () => {
    expect(() => treeOf(`<HistoryTree><Node name="x"/></HistoryTree>`)).toThrow(MalformedBlockError);
    expect(() => treeOf(`<HistoryTree><Node ID="1.5"/></HistoryTree>`)).toThrow(MalformedBlockError);
  });

  test("rejects markup without any node", () => {
    expect(() => treeOf(`<HistoryTree/>`)).toThrow("History markup contains no <Node> element");
  });
});

describe("parseOperation", () => {
  test("separates known operations from others", () => {
    expect(parseOperation("gibsonAssembly")).toEqual({ kind: "known", name: "gibsonAssembly" });
    expect(parseOperation("futureOperation")).toEqual({ kind: "other", name: "futureOperation" });
    expect(parseOperation(undefined)).toEqual({ kind: "known", name: "invalid" });
  });
});

describe("getHistoryTree", () => {
  test("reads the tree from the compressed block 7", () => {
    const xml = `<HistoryTree><Node ID="0" name="current.dna" operation="makeNewFile"/></HistoryTree>`;
    const file = parseSnapGene(snapgeneFile(block(7, xzCompress(ascii(xml)))), {
      onWarning: quiet,
    });

    const tree = getHistoryTree(file, { onWarning: quiet });
    expect(tree?.nodes[0]?.name).toBe("current.dna");
    expect(tree?.nodes[0]?.operation).toEqual({ kind: "known", name: "makeNewFile" });
  });

  test("reads history chains deeper than the XML parser's default nesting", () => {
    const file = parseSnapGene(snapgeneFile(block(7, xzCompress(ascii(chain(1024))))), { onWarning: quiet });

    const tree = getHistoryTree(file, { onWarning: quiet });
    expect(tree?.nodes).toHaveLength(1024);
    expect(tree?.nodes[1023]?.name).toBe("n1023");
  });

  test("applies the history depth limit to long chains", () => {
    const file = parseSnapGene(snapgeneFile(block(7, xzCompress(ascii(chain(1024))))), { onWarning: quiet });

    let caught: unknown;
    try {
      getHistoryTree(file, { maxHistoryDepth: 200, onWarning: quiet });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NestingTooDeepError);
    expect(caught instanceof NestingTooDeepError && caught.limit).toBe(200);
  });

  test("raises the markup nesting limit with the history limit", () => {
    const file = parseSnapGene(snapgeneFile(block(7, xzCompress(ascii(chain(5000))))), { onWarning: quiet });

    expect(() => getHistoryTree(file, { onWarning: quiet })).toThrow(MalformedBlockError);
    expect(getHistoryTree(file, { maxHistoryDepth: 5000, onWarning: quiet })?.nodes).toHaveLength(5000);
  });

  test("returns undefined when the file has no history", () => {
    const file = parseSnapGene(snapgeneFile(block(6, ascii("<Notes/>"))), { onWarning: quiet });
    expect(getHistoryTree(file)).toBeUndefined();
  });
});

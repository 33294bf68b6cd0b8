import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { displayName } from "../graph/task.js";
import type { TaskGraph } from "../graph/task-graph.js";
import type { Edge, TaskKind } from "../graph/types.js";

export type GraphLabel = {
  text: string;
  kind: TaskKind;
};

/** Draws a graph's structure to a file. */
export interface GraphRenderer {
  render(edges: readonly Edge[], labels: ReadonlyMap<string, GraphLabel>, outputPath: string): Promise<void>;
}

/** Display labels for every node, in insertion order. */
export function graphLabels(graph: TaskGraph): Map<string, GraphLabel> {
  const labels = new Map<string, GraphLabel>();
  for (const { task } of graph.nodes()) {
    labels.set(task.name, { text: displayName(task), kind: task.kind });
  }
  return labels;
}

/** `round-<n>.dot`, or one of `keep` rotating slots. */
export function roundFileName(round: number, keep = 0): string {
  const slot = keep > 0 ? round % keep : round;
  return `round-${slot}.dot`;
}

function quote(id: string): string {
  return `"${id.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\r?\n/g, "\\n")}"`;
}

export function toDot(edges: readonly Edge[], labels: ReadonlyMap<string, GraphLabel>): string {
  const lines = ["digraph TaskGraph {", "  rankdir=LR;", "  node [fontname=\"Helvetica\"];"];

  for (const [name, label] of labels) {
    const shape = label.kind === "regular" ? "box" : "ellipse";
    lines.push(`  ${quote(name)} [label=${quote(label.text)}, shape=${shape}];`);
  }
  for (const [from, to] of edges) {
    lines.push(`  ${quote(from)} -> ${quote(to)};`);
  }

  lines.push("}");
  return `${lines.join("\n")}\n`;
}

/** Writes Graphviz DOT source; turn it into an image with `dot -Tpng`. */
export class DotRenderer implements GraphRenderer {
  async render(edges: readonly Edge[], labels: ReadonlyMap<string, GraphLabel>, outputPath: string): Promise<void> {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, toDot(edges, labels), "utf-8");
  }
}

import {
  ClickstreamEvent,
  FlowDiagram,
  FlowEdge,
} from "../entities";
import { InvalidFunnelError } from "../errors";

/** Reject step sequences that would make name-to-node lookup ambiguous. */
export function validateFunnelSteps(steps: readonly string[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const step of steps) {
    if (seen.has(step)) duplicates.add(step);
    seen.add(step);
  }

  if (duplicates.size > 0) {
    const names = [...duplicates];
    throw new InvalidFunnelError(`Duplicate funnel step(s): ${names.join(", ")}`, names);
  }
}

function countEventNames(events: readonly ClickstreamEvent[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const event of events) {
    counts.set(event.eventName, (counts.get(event.eventName) ?? 0) + 1);
  }
  return counts;
}

/**
 * Link each adjacent pair of steps. Volume is the smaller of the two step
 * counts and the percentage is target over source; individual users are not
 * followed between steps, and percentages above 100 are kept as is.
 */
export function buildFunnelFlow(
  events: readonly ClickstreamEvent[],
  steps: readonly string[]
): FlowEdge[] {
  const counts = countEventNames(events);
  const edges: FlowEdge[] = [];

  for (let i = 0; i < steps.length - 1; i++) {
    const source = steps[i];
    const target = steps[i + 1];
    const sourceCount = counts.get(source) ?? 0;
    const targetCount = counts.get(target) ?? 0;
    const conversionPercent = sourceCount > 0 ? (targetCount / sourceCount) * 100 : 0;

    edges.push({
      source,
      target,
      volume: Math.min(sourceCount, targetCount),
      conversionPercent,
    });
  }

  return edges;
}

export function buildFlowDiagram(edges: readonly FlowEdge[], steps: readonly string[]): FlowDiagram {
  const indexByStep = new Map<string, number>();
  steps.forEach((step, index) => {
    if (!indexByStep.has(step)) indexByStep.set(step, index);
  });

  const nodeIndex = (step: string): number => {
    const index = indexByStep.get(step);
    if (index === undefined) {
      throw new InvalidFunnelError(`Flow edge references unknown step: ${step}`, []);
    }
    return index;
  };

  return {
    nodes: steps.map((label, index) => ({ index, label })),
    links: edges.map((edge) => ({
      source: nodeIndex(edge.source),
      target: nodeIndex(edge.target),
      value: edge.volume,
      conversionPercent: edge.conversionPercent,
    })),
  };
}

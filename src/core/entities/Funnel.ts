export const FUNNEL_STEPS: readonly string[] = [
  "SUBSCRIPTION-CURATED-PLAN-SELECTION-LAUNCH",
  "SUBSCRIPTION-CURATED-PLAN-SELECTION-PROCEED",
  "APP-SELECTION-PAGE",
  "CHOOSE_YOUR_APP_PROCEED",
  "SUBSCRIPTION-SUMMARY-LAUNCH",
  "SUBSCRIPTION-SUMMARY-PROCEED",
  "PAYMENT-INITIATE",
  "PAYMENT",
  "BINGE-SUBSCRIPTION",
  "SUBSCRIBE-SUCCESS",
] as const;

export const CONVERSION_EVENTS: readonly string[] = [
  "BINGE-SUBSCRIPTION",
  "SUBSCRIBE-SUCCESS",
] as const;

export interface FlowEdge {
  source: string;
  target: string;
  volume: number;
  conversionPercent: number;
}

export interface FlowNode {
  index: number;
  label: string;
}

export interface FlowLink {
  source: number;
  target: number;
  value: number;
  conversionPercent: number;
}

export interface FlowDiagram {
  nodes: FlowNode[];
  links: FlowLink[];
}

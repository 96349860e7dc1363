import { type Link, type LinkSample, linkKeyString, type Node, type NodeSample } from "./types.js";

export function nodeSample(node: Node, timestamp: number): NodeSample {
  const { attributes } = node;
  return {
    nodeId: node.id,
    timestamp,
    upTimeSeconds: attributes.upTimeSeconds,
    load1: attributes.loadAverages?.[0] ?? null,
    linkCount: attributes.linkCount,
    radioLinkCount: attributes.radioLinkCount,
    dtdLinkCount: attributes.dtdLinkCount,
    tunnelLinkCount: attributes.tunnelLinkCount,
  };
}

export function linkSample(link: Link, timestamp: number): LinkSample {
  return {
    linkKey: linkKeyString(link),
    timestamp,
    signal: link.signal,
    noise: link.noise,
    quality: link.quality,
    neighborQuality: link.neighborQuality,
    cost: link.cost,
    txRate: link.txRate,
    rxRate: link.rxRate,
  };
}

import { useEffect, useMemo, useRef } from 'react';
import * as d3 from 'd3';
import { sankey, sankeyLinkHorizontal, type SankeyNode } from 'd3-sankey';
import { buildMoneyFlowGraph, type FlowNodeKind } from '../../domain/computations';
import { formatMoney } from '../../domain/money';
import type { MoneyFlow } from '../../domain/types';

interface MoneyFlowDiagramProps {
  flows: MoneyFlow[];
  currency: string;
}

// aliases, not interfaces: d3-sankey's generics need an index signature
type NodeDatum = { id: string; name: string; kind: FlowNodeKind };
type LinkDatum = { value: number };

type LaidOutNode = SankeyNode<NodeDatum, LinkDatum>;

const KIND_COLORS: Record<FlowNodeKind, string> = {
  source: '#2e9e6b',
  vault: '#3b6fd4',
  sink: '#d4553b',
};

function nodeOf(end: string | number | LaidOutNode): LaidOutNode | null {
  return typeof end === 'object' ? end : null;
}

export function MoneyFlowDiagram({ flows, currency }: MoneyFlowDiagramProps) {
  const svgRef = useRef<SVGSVGElement>(null);
  const graph = useMemo(() => buildMoneyFlowGraph(flows), [flows]);

  useEffect(() => {
    const svgElement = svgRef.current;
    if (!svgElement) return;

    const svg = d3.select(svgElement);
    svg.selectAll('*').remove();
    if (graph.links.length === 0) return;

    const width = 640;
    const height = Math.max(280, graph.nodes.length * 32);
    const margin = { top: 10, right: 130, bottom: 10, left: 130 };

    svg.attr('width', width).attr('height', height).attr('viewBox', `0 0 ${width} ${height}`);

    const layout = sankey<NodeDatum, LinkDatum>()
      .nodeWidth(18)
      .nodePadding(14)
      .extent([
        [margin.left, margin.top],
        [width - margin.right, height - margin.bottom],
      ]);

    const { nodes, links } = layout({
      nodes: graph.nodes.map((d) => ({ ...d })),
      links: graph.links.map((d) => ({ ...d })),
    });

    svg
      .append('g')
      .attr('class', 'links')
      .selectAll('path')
      .data(links)
      .join('path')
      .attr('d', sankeyLinkHorizontal())
      .attr('fill', 'none')
      .attr('stroke', (d) => KIND_COLORS[nodeOf(d.source)?.kind ?? 'vault'])
      .attr('stroke-opacity', 0.45)
      .attr('stroke-width', (d) => Math.max(1, d.width ?? 0))
      .append('title')
      .text((d) => `${nodeOf(d.source)?.name ?? ''} → ${nodeOf(d.target)?.name ?? ''}: ${formatMoney(d.value, currency)}`);

    svg
      .append('g')
      .attr('class', 'nodes')
      .selectAll('rect')
      .data(nodes)
      .join('rect')
      .attr('x', (d) => d.x0 ?? 0)
      .attr('y', (d) => d.y0 ?? 0)
      .attr('width', (d) => (d.x1 ?? 0) - (d.x0 ?? 0))
      .attr('height', (d) => Math.max(1, (d.y1 ?? 0) - (d.y0 ?? 0)))
      .attr('fill', (d) => KIND_COLORS[d.kind]);

    svg
      .append('g')
      .attr('class', 'labels')
      .selectAll('text')
      .data(nodes)
      .join('text')
      .attr('x', (d) => ((d.x0 ?? 0) < width / 2 ? (d.x0 ?? 0) - 6 : (d.x1 ?? 0) + 6))
      .attr('y', (d) => ((d.y0 ?? 0) + (d.y1 ?? 0)) / 2)
      .attr('dy', '0.35em')
      .attr('text-anchor', (d) => ((d.x0 ?? 0) < width / 2 ? 'end' : 'start'))
      .attr('font-size', '12px')
      .text((d) => `${d.name} ${formatMoney(d.value ?? 0, currency)}`);
  }, [graph, currency]);

  if (graph.links.length === 0) {
    return (
      <div className="sankey-diagram">
        <p className="no-data">No money has moved yet</p>
      </div>
    );
  }

  return (
    <div className="sankey-diagram">
      <svg ref={svgRef} role="img" aria-label="Money flow from income categories through vaults to spending" />
    </div>
  );
}

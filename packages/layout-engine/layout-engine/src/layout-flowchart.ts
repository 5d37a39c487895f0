import type {
  FlowchartBlock,
  FlowchartConnector,
  FlowchartLayout,
  FlowchartStep,
  LayoutConfig,
  SectionPlacement,
} from '@slidegrid/contracts';
import { layoutSectionBase } from './section-header.js';

/** Offset of the first step below the placement top (header bar plus a small gap). */
const STEP_TOP_OFFSET_MM = 12;

/** Gap between horizontal steps, also used as the outer inset. */
const HORIZONTAL_GAP_MM = 5;

/** Inset of vertical steps from each side of the placement. */
const VERTICAL_INSET_MM = 10;

/** Space between stacked vertical steps, room for the arrow. */
const VERTICAL_GAP_MM = 7;

function horizontalSteps(texts: string[], placement: SectionPlacement, config: LayoutConfig): FlowchartStep[] {
  const count = Math.max(1, texts.length);
  // Many steps overflow the placement to the right rather than shrinking below zero.
  const stepWidth = Math.max(0, (placement.width - HORIZONTAL_GAP_MM * 2) / count - HORIZONTAL_GAP_MM);
  return texts.map((text, index) => ({
    text,
    index,
    x: placement.x + HORIZONTAL_GAP_MM + index * (stepWidth + HORIZONTAL_GAP_MM),
    y: placement.y + STEP_TOP_OFFSET_MM,
    width: stepWidth,
    height: config.components.flowchart.stepHeightMm,
  }));
}

function verticalSteps(texts: string[], placement: SectionPlacement, config: LayoutConfig): FlowchartStep[] {
  const stepHeight = config.components.flowchart.verticalStepHeightMm;
  return texts.map((text, index) => ({
    text,
    index,
    x: placement.x + VERTICAL_INSET_MM,
    y: placement.y + STEP_TOP_OFFSET_MM + index * (stepHeight + VERTICAL_GAP_MM),
    width: placement.width - VERTICAL_INSET_MM * 2,
    height: stepHeight,
  }));
}

/**
 * One connector between each pair of consecutive steps, none after the last.
 * Horizontal arrows join right-middle to left-middle; vertical ones join
 * bottom-centre to top-centre.
 */
export function connectSteps(steps: FlowchartStep[], direction: FlowchartLayout['direction']): FlowchartConnector[] {
  const connectors: FlowchartConnector[] = [];
  for (let index = 0; index + 1 < steps.length; index += 1) {
    const from = steps[index];
    const to = steps[index + 1];
    connectors.push(
      direction === 'v'
        ? {
            from: from.index,
            to: to.index,
            start: { x: from.x + from.width / 2, y: from.y + from.height },
            end: { x: to.x + to.width / 2, y: to.y },
          }
        : {
            from: from.index,
            to: to.index,
            start: { x: from.x + from.width, y: from.y + from.height / 2 },
            end: { x: to.x, y: to.y + to.height / 2 },
          },
    );
  }
  return connectors;
}

export function layoutFlowchartSection(
  block: FlowchartBlock,
  placement: SectionPlacement,
  config: LayoutConfig,
): FlowchartLayout {
  const { steps: texts, direction } = block.content;
  const steps =
    direction === 'v' ? verticalSteps(texts, placement, config) : horizontalSteps(texts, placement, config);

  return {
    kind: 'flowchart',
    ...layoutSectionBase(block, placement, config),
    direction,
    steps,
    connectors: connectSteps(steps, direction),
  };
}

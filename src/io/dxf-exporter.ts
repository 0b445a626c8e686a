// src/io/dxf-exporter.ts
import { Colors, DxfWriter, Units, point3d } from "@tarikjabiri/dxf";

import type {
  Circle,
  ClassifiedEntities,
  ClosedPath,
  Vec2,
} from "../types/board-model";
import type { DxfExportLayer, DxfExportOptions } from "../types/options";
import {
  boundingBoxCenter,
  pathBoundingBox,
} from "../geometry/metrics";
import { arcSweep, assertNever } from "../geometry/segments";

export const DEFAULT_DXF_LAYERS: Readonly<Record<DxfExportLayer, string>> = {
  outline: "BOARD_OUTLINE",
  cutouts: "CUTOUTS",
  holes: "HOLES",
  keepouts: "KEEPOUTS",
  soldermask: "SOLDERMASK",
  unclassified: "UNCLASSIFIED",
  annotations: "ANNOTATIONS",
};

// AutoCAD color index values with no named Colors member
const ACI_DARK_GRAY = 8;
const ACI_LIGHT_GRAY = 9;

const LAYER_COLORS: Readonly<Record<DxfExportLayer, number>> = {
  outline: Colors.Yellow,
  cutouts: Colors.Red,
  holes: Colors.Cyan,
  keepouts: ACI_DARK_GRAY,
  soldermask: Colors.Green,
  unclassified: Colors.White,
  annotations: ACI_LIGHT_GRAY,
};

/**
 * Write classified board geometry into a DXF document, one layer per role.
 * Only layers that receive at least one entity are declared.
 */
export function exportClassifiedToDxf(
  result: ClassifiedEntities,
  options: DxfExportOptions = {}
): string {
  const dxf = new DxfWriter();
  dxf.setUnits(Units.Millimeters);

  const names = { ...DEFAULT_DXF_LAYERS, ...options.layerNames };
  const offset = options.recenter ? recenterOffset(result) : { x: 0, y: 0 };

  const pathGroups: [DxfExportLayer, ClosedPath[]][] = [
    ["outline", result.outline ? [result.outline] : []],
    ["cutouts", result.cutouts],
    ["keepouts", result.keepouts],
    ["soldermask", result.soldermaskOpenings],
    ["unclassified", result.unclassifiedPaths],
  ];
  const circleGroups: [DxfExportLayer, Circle[]][] = [
    ["holes", result.holes],
    ["unclassified", result.unclassifiedCircles],
  ];

  const declared = new Set<DxfExportLayer>();
  const useLayer = (layer: DxfExportLayer): string => {
    if (!declared.has(layer)) {
      dxf.addLayer(names[layer], LAYER_COLORS[layer], "CONTINUOUS");
      declared.add(layer);
    }
    return names[layer];
  };

  for (const [layer, paths] of pathGroups) {
    for (const path of paths) {
      writePath(dxf, path, useLayer(layer), offset);
    }
  }

  for (const [layer, circles] of circleGroups) {
    for (const c of circles) {
      dxf.addCircle(point3d(c.center.x + offset.x, c.center.y + offset.y, 0), c.radius, {
        layerName: useLayer(layer),
      });
    }
  }

  for (const text of result.texts) {
    dxf.addText(
      point3d(text.position.x + offset.x, text.position.y + offset.y, 0),
      text.height,
      text.content,
      { layerName: useLayer("annotations"), rotation: text.rotation }
    );
  }

  return dxf.stringify();
}

function writePath(dxf: DxfWriter, path: ClosedPath, layerName: string, offset: Vec2): void {
  for (const seg of path.segments) {
    switch (seg.kind) {
      case "line":
        dxf.addLine(
          point3d(seg.start.x + offset.x, seg.start.y + offset.y, 0),
          point3d(seg.end.x + offset.x, seg.end.y + offset.y, 0),
          { layerName }
        );
        break;
      case "arc": {
        if (seg.radius <= 0) break;
        const center = point3d(seg.center.x + offset.x, seg.center.y + offset.y, 0);
        if (Math.abs(arcSweep(seg)) >= 360) {
          dxf.addCircle(center, seg.radius, { layerName });
          break;
        }
        // DXF arcs always run counter-clockwise
        const [start, end] =
          arcSweep(seg) < 0
            ? [seg.endAngle, seg.startAngle]
            : [seg.startAngle, seg.endAngle];
        dxf.addArc(
          center,
          seg.radius,
          start,
          end,
          { layerName }
        );
        break;
      }
      default:
        assertNever(seg);
    }
  }
}

function recenterOffset(result: ClassifiedEntities): Vec2 {
  if (!result.outline) return { x: 0, y: 0 };
  const center = boundingBoxCenter(pathBoundingBox(result.outline));
  return { x: -center.x, y: -center.y };
}

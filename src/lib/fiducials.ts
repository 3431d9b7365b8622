export interface Point {
  x: number;
  y: number;
}

/** Chart corner marks in scan pixel coordinates. */
export interface Fiducials {
  topLeft: Point;
  topRight: Point;
  bottomRight: Point;
  bottomLeft: Point;
}

export const FIDUCIAL_FORMAT = "X1,Y1,X2,Y2,X3,Y3,X4,Y4";

/**
 * Parse eight comma-separated pixel coordinates ordered top-left,
 * top-right, bottom-right, bottom-left.
 */
export const parseFiducials = (raw: string): Fiducials => {
  const parts = raw.split(",").map((part) => part.trim());
  if (parts.length !== 8) {
    throw new Error(
      `Expected 8 comma-separated values (${FIDUCIAL_FORMAT}), got ${parts.length}.`,
    );
  }

  const values = parts.map((part, index) => {
    const value = part.length > 0 ? Number(part) : Number.NaN;
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(
        `Coordinate ${index + 1} ("${part}") must be a non-negative number.`,
      );
    }
    return value;
  });

  const [x1, y1, x2, y2, x3, y3, x4, y4] = values;
  return {
    topLeft: { x: x1, y: y1 },
    topRight: { x: x2, y: y2 },
    bottomRight: { x: x3, y: y3 },
    bottomLeft: { x: x4, y: y4 },
  };
};

export const formatFiducials = (fiducials: Fiducials): string =>
  [
    fiducials.topLeft,
    fiducials.topRight,
    fiducials.bottomRight,
    fiducials.bottomLeft,
  ]
    .flatMap((point) => [point.x, point.y])
    .join(",");

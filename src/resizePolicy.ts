import { ResizeError } from "./errors.js";
import type { ResizeAction, ResizeMode, Size } from "./types.js";

function requirePositive(label: string, value: number): void {
  if (!(value > 0)) {
    throw new ResizeError(`invalid target ${label}: ${value}`);
  }
}

// Shrink-only fit of `size` inside `bounds`, keeping the aspect ratio.
function fitWithin(size: Size, bounds: Size): ResizeAction {
  const scale = Math.min(bounds.width / size.width, bounds.height / size.height);
  if (scale >= 1) {
    return { kind: "none" };
  }

  return {
    kind: "resize",
    size: {
      width: Math.max(1, Math.round(size.width * scale)),
      height: Math.max(1, Math.round(size.height * scale)),
    },
  };
}

/**
 * Decides the dimensions an image should be resampled to. Only the exact-size
 * mode without aspect preservation may enlarge an image.
 */
export function computeTargetSize(current: Size, mode: ResizeMode): ResizeAction {
  switch (mode.kind) {
    case "none":
      return { kind: "none" };

    case "max-dimension":
      requirePositive("max dimension", mode.maxDimension);
      return fitWithin(current, { width: mode.maxDimension, height: mode.maxDimension });

    case "exact-size":
      requirePositive("width", mode.width);
      requirePositive("height", mode.height);
      if (mode.maintainAspect) {
        return fitWithin(current, { width: mode.width, height: mode.height });
      }
      return { kind: "resize", size: { width: mode.width, height: mode.height } };
  }
}

import type { FootprintEstimator, LabelRequest, LabelStyle, Size } from "../types.js";
import { LABEL_STYLES } from "./defaults.js";

interface TextEstimatorConfig {
  minWidth: number;
  minHeight: number;
}

const DEFAULT_ESTIMATOR_CONFIG: TextEstimatorConfig = {
  minWidth: 1,
  minHeight: 1,
};

function charUnits(ch: string): number {
  if (/\s/u.test(ch)) {
    return 0.5;
  }

  if (/[\u3000-\u9FFF\uF900-\uFAFF]/u.test(ch)) {
    return 1.8;
  }

  if (/[A-Z]/u.test(ch)) {
    return 1.1;
  }

  return 1.0;
}

export function effectiveTextLength(text: string): number {
  let total = 0;
  for (const ch of text) {
    total += charUnits(ch);
  }
  return total;
}

function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, "\n").split("\n");
}

// Glyph-free stand-in for real text metrics; callers with a font stack inject their own estimator.
export function createTextEstimator(config: Partial<TextEstimatorConfig> = {}): FootprintEstimator {
  const resolved = { ...DEFAULT_ESTIMATOR_CONFIG, ...config };
  return {
    estimate({ text, style }: LabelRequest): Size {
      const lines = splitLines(text);
      const longest = Math.max(0, ...lines.map((line) => effectiveTextLength(line)));
      const width = longest * style.fontSize * style.charWidthRatio + style.paddingX * 2;
      const height = lines.length * style.fontSize * style.lineHeightRatio + style.paddingY * 2;
      return {
        width: Math.max(resolved.minWidth, width),
        height: Math.max(resolved.minHeight, height),
      };
    },
  };
}

export function labelStyle(name: string): LabelStyle {
  const style = LABEL_STYLES[name];
  if (!style) {
    throw new Error(`Unknown label style: ${name}`);
  }
  return style;
}

export function measureLabel(text: string, styleName: string, estimator: FootprintEstimator = createTextEstimator()): Size {
  return estimator.estimate({ text, style: labelStyle(styleName) });
}

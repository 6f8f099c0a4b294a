import { FormatKind } from "../types";
import { ExtractionStrategy, StrategyKind } from "./ExtractionStrategy";
import { GenericChapterVerseStrategy } from "./genericStrategy";
import { OsisAttributeStrategy, OsisMilestoneStrategy } from "./osisStrategies";
import { UsfxStrategy } from "./usfxStrategy";

export * from "./ExtractionStrategy";

const usfx = new UsfxStrategy();
const osisAttribute = new OsisAttributeStrategy();
const osisMilestone = new OsisMilestoneStrategy();
const generic = new GenericChapterVerseStrategy();

export const STRATEGIES: Readonly<Record<StrategyKind, ExtractionStrategy>> = {
  usfx,
  "osis-attribute": osisAttribute,
  "osis-sid-eid": osisMilestone,
  "generic-chapter-verse": generic,
};

// Tried in this order when the format could not be detected
export const FALLBACK_ORDER: readonly ExtractionStrategy[] = [
  usfx,
  osisAttribute,
  osisMilestone,
  generic,
];

export function strategiesFor(kind: FormatKind): readonly ExtractionStrategy[] {
  return kind === "unknown" ? FALLBACK_ORDER : [STRATEGIES[kind]];
}

export type ExclusionZone = { x1: number; y1: number; x2: number; y2: number };

export type SafetyPolicy = Readonly<{
  screenWidth: number;
  screenHeight: number;
  bottomMargin: number;
  exclusionZones: ReadonlyArray<ExclusionZone>;
  forbiddenTextPatterns: ReadonlyArray<string>;
  forbiddenKeyCombos: ReadonlyArray<string>;
  maxTextLength: number;
  maxWaitSeconds: number;
}>;

export type SafetyVerdict =
  | { approved: true }
  | { approved: false; reason: string };

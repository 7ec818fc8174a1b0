import { Coordinates, ScrollDirection } from "./decision.types";

export type ScreenSize = { width: number; height: number };

export type Screenshot = {
  base64: string;
  mimeType: "image/png";
  capturedAt: Date;
};

/**
 * Takes a picture of the current desktop. Rejects when no usable image
 * could be produced.
 */
export interface ScreenCapturer {
  capture(): Promise<Screenshot>;
}

/**
 * OS-level mouse and keyboard primitives. Every call either completes or
 * rejects; callers never see a partial result.
 */
export interface InputInjector {
  moveTo(x: number, y: number, durationMs: number): Promise<void>;
  click(): Promise<void>;
  rightClick(): Promise<void>;
  middleClick(): Promise<void>;
  typeText(text: string, intervalMs: number): Promise<void>;
  pressKey(key: string): Promise<void>;
  pressCombo(keys: string[]): Promise<void>;
  scroll(
    direction: ScrollDirection,
    amount: number,
    at: Coordinates,
  ): Promise<void>;
  getScreenSize(): Promise<ScreenSize>;
  getCursorPosition(): Promise<Coordinates>;
}

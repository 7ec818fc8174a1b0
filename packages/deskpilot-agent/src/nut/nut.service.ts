import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import {
  Button,
  FileType,
  Key,
  keyboard,
  mouse,
  Point,
  screen,
  straightTo,
} from '@nut-tree-fork/nut-js';
import { promises as fs } from 'fs';
import { setTimeout as delay } from 'timers/promises';
import {
  Coordinates,
  InputInjector,
  ScreenCapturer,
  Screenshot,
  ScreenSize,
  ScrollDirection,
} from '@deskpilot/shared';
import { agentConfig, AgentConfig } from '../config/agent.config';
import { errorMessage } from '../common/pipeline.errors';

type KeyInfo = { keyCode: Key; withShift: boolean };

// nut-js key names, lowercased, without the reverse numeric entries
const NutKeyMapLowercase = new Map<string, Key>(
  Object.entries(Key)
    .filter((entry): entry is [string, Key] => typeof entry[1] === 'number')
    .map(([name, value]) => [name.toLowerCase(), value]),
);

// Common spellings of key names mapped onto nut-js names
const KEY_ALIASES: Record<string, string> = {
  ctrl: 'LeftControl',
  control: 'LeftControl',
  shift: 'LeftShift',
  alt: 'LeftAlt',
  option: 'LeftAlt',
  cmd: 'LeftCmd',
  command: 'LeftCmd',
  meta: 'LeftMeta',
  win: 'LeftSuper',
  windows: 'LeftSuper',
  super: 'LeftSuper',
  ret: 'Enter',
  return: 'Enter',
  esc: 'Escape',
  del: 'Delete',
  spacebar: 'Space',
  pgup: 'PageUp',
  pgdn: 'PageDown',
  arrowup: 'Up',
  arrowdown: 'Down',
  arrowleft: 'Left',
  arrowright: 'Right',
  '0': 'Num0',
  '1': 'Num1',
  '2': 'Num2',
  '3': 'Num3',
  '4': 'Num4',
  '5': 'Num5',
  '6': 'Num6',
  '7': 'Num7',
  '8': 'Num8',
  '9': 'Num9',
};

const SHIFTED_CHARS: Record<string, string> = {
  '!': '1',
  '@': '2',
  '#': '3',
  $: '4',
  '%': '5',
  '^': '6',
  '&': '7',
  '*': '8',
  '(': '9',
  ')': '0',
  _: 'Minus',
  '+': 'Equal',
  '{': 'LeftBracket',
  '}': 'RightBracket',
  '|': 'Backslash',
  ':': 'Semicolon',
  '"': 'Quote',
  '<': 'Comma',
  '>': 'Period',
  '?': 'Slash',
  '~': 'Grave',
};

const PLAIN_CHARS: Record<string, string> = {
  ' ': 'Space',
  '.': 'Period',
  ',': 'Comma',
  ';': 'Semicolon',
  "'": 'Quote',
  '`': 'Grave',
  '-': 'Minus',
  '=': 'Equal',
  '[': 'LeftBracket',
  ']': 'RightBracket',
  '\\': 'Backslash',
  '/': 'Slash',
  '\n': 'Enter',
  '\r': 'Enter',
  '\t': 'Tab',
};

/**
 * Desktop adapter on nut-js: mouse and keyboard injection plus full-screen
 * capture.
 */
@Injectable()
export class NutService implements InputInjector, ScreenCapturer, OnModuleInit {
  private readonly logger = new Logger(NutService.name);
  private readonly screenshotDir: string;

  constructor(@Inject(agentConfig.KEY) config: AgentConfig) {
    this.screenshotDir = config.files.screenshotDir;

    mouse.config.autoDelayMs = 100;
    // Spacing between typed characters is applied by typeText itself
    keyboard.config.autoDelayMs = 0;
  }

  async onModuleInit(): Promise<void> {
    await fs.mkdir(this.screenshotDir, { recursive: true });
  }

  /**
   * Resolves a key name such as `enter`, `ctrl`, `F5` or `a` to a nut-js key.
   */
  resolveKey(name: string): Key {
    const lowered = name.trim().toLowerCase();
    const canonical = (KEY_ALIASES[lowered] ?? lowered).toLowerCase();
    const nutKey = NutKeyMapLowercase.get(canonical);
    if (nutKey === undefined) {
      throw new Error(`Invalid key: '${name}'`);
    }
    return nutKey;
  }

  charToKeyInfo(char: string): KeyInfo | null {
    if (/^[a-z0-9]$/.test(char)) {
      return { keyCode: this.resolveKey(char), withShift: false };
    }
    if (/^[A-Z]$/.test(char)) {
      return { keyCode: this.resolveKey(char.toLowerCase()), withShift: true };
    }

    const plain = PLAIN_CHARS[char];
    if (plain !== undefined) {
      return { keyCode: this.resolveKey(plain), withShift: false };
    }
    const shifted = SHIFTED_CHARS[char];
    if (shifted !== undefined) {
      return { keyCode: this.resolveKey(shifted), withShift: true };
    }
    return null;
  }

  async moveTo(x: number, y: number, durationMs: number): Promise<void> {
    const target = new Point(x, y);
    const current = await mouse.getPosition();
    const distance = Math.hypot(x - current.x, y - current.y);

    if (distance === 0 || durationMs <= 0) {
      await mouse.setPosition(target);
      return;
    }

    // mouseSpeed is in pixels per second
    mouse.config.mouseSpeed = Math.max(1, distance / (durationMs / 1000));
    await mouse.move(straightTo(target));
  }

  async click(): Promise<void> {
    await mouse.click(Button.LEFT);
  }

  async rightClick(): Promise<void> {
    await mouse.click(Button.RIGHT);
  }

  async middleClick(): Promise<void> {
    await mouse.click(Button.MIDDLE);
  }

  /**
   * Types text one character at a time. `\r\n` produces a single Enter.
   */
  async typeText(text: string, intervalMs: number): Promise<void> {
    this.logger.debug(`Typing ${text.length} characters`);

    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === '\r' && text[i + 1] === '\n') {
        continue;
      }

      const keyInfo = this.charToKeyInfo(char);
      if (!keyInfo) {
        throw new Error(
          `No key mapping for character: "${char}" (code: ${char.charCodeAt(0)})`,
        );
      }

      if (keyInfo.withShift) {
        await keyboard.pressKey(Key.LeftShift, keyInfo.keyCode);
        await keyboard.releaseKey(Key.LeftShift, keyInfo.keyCode);
      } else {
        await keyboard.pressKey(keyInfo.keyCode);
        await keyboard.releaseKey(keyInfo.keyCode);
      }

      if (intervalMs > 0 && i < text.length - 1) {
        await delay(intervalMs);
      }
    }
  }

  async pressKey(key: string): Promise<void> {
    const nutKey = this.resolveKey(key);
    await keyboard.pressKey(nutKey);
    await keyboard.releaseKey(nutKey);
  }

  /**
   * Holds every key in order, then releases them in reverse.
   */
  async pressCombo(keys: string[]): Promise<void> {
    const nutKeys = keys.map((key) => this.resolveKey(key));
    await keyboard.pressKey(...nutKeys);
    await keyboard.releaseKey(...[...nutKeys].reverse());
  }

  async scroll(
    direction: ScrollDirection,
    amount: number,
    at: Coordinates,
  ): Promise<void> {
    await mouse.setPosition(new Point(at.x, at.y));
    switch (direction) {
      case 'up':
        await mouse.scrollUp(amount);
        break;
      case 'down':
        await mouse.scrollDown(amount);
        break;
      case 'left':
        await mouse.scrollLeft(amount);
        break;
      case 'right':
        await mouse.scrollRight(amount);
        break;
    }
  }

  async getScreenSize(): Promise<ScreenSize> {
    const [width, height] = await Promise.all([screen.width(), screen.height()]);
    return { width, height };
  }

  async getCursorPosition(): Promise<Coordinates> {
    const position = await mouse.getPosition();
    return { x: position.x, y: position.y };
  }

  /**
   * Captures the full screen through a temporary PNG file.
   */
  async capture(): Promise<Screenshot> {
    const filename = `screenshot-${Date.now()}`;
    const filepath = await screen.capture(
      filename,
      FileType.PNG,
      this.screenshotDir,
    );

    try {
      const image = await fs.readFile(filepath);
      return {
        base64: image.toString('base64'),
        mimeType: 'image/png',
        capturedAt: new Date(),
      };
    } finally {
      await fs.unlink(filepath).catch((unlinkError: unknown) => {
        this.logger.warn(
          `Failed to remove temporary screenshot ${filepath}: ${errorMessage(unlinkError)}`,
        );
      });
    }
  }
}

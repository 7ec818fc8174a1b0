export const INPUT_INJECTOR = Symbol('INPUT_INJECTOR');
export const SCREEN_CAPTURER = Symbol('SCREEN_CAPTURER');

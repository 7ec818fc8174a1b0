// Instructions mentioning any of these need a working network connection
export const NETWORK_KEYWORDS = [
  'chrome',
  'firefox',
  'edge',
  'browser',
  'outlook',
  'email',
  'teams',
  'discord',
  'steam',
  'spotify',
  'youtube',
  'google',
  'internet',
  'online',
  'web',
  'gmail',
  'facebook',
  'twitter',
] as const;

export const DEFAULT_RULES = `AUTOMATION SAFETY RULES:
1. Never perform destructive actions like deleting files or formatting drives
2. Never access sensitive information or passwords
3. Always confirm actions that might affect system settings
4. Prefer safe, reversible actions
5. If unsure about an action, prefer a short wait over a guess
6. Never automate actions that could harm the system or user data
7. Avoid clicking on suspicious links or downloads
8. Never perform financial transactions

RESPONSE FORMAT:
Always respond with exactly one JSON object:
{
    "action": "click|type|key|scroll|wait",
    "coordinates": [x, y] (for click actions),
    "button": "left|right|middle" (optional, for click actions),
    "clickCount": 1-3 (optional, for click actions),
    "text": "text to type" (for type actions),
    "key": "key name" (for key actions like 'enter', 'tab', 'ctrl+c'),
    "direction": "up|down|left|right" (for scroll actions),
    "amount": number (for scroll amount),
    "duration": seconds (for wait actions),
    "reasoning": "explanation of why this action was chosen"
}`;

const OFFLINE_NOTE = `IMPORTANT: This command requires internet connectivity, but internet is not currently available.
You should respond with a wait action and explain that you're waiting for internet connectivity.
Example response: {"action": "wait", "duration": 5, "reasoning": "Waiting for internet connection"}`;

const ONLINE_NOTE =
  'INTERNET STATUS: Internet connection is available. You can proceed with internet-dependent actions.';

export function needsNetwork(instruction: string): boolean {
  const lowered = instruction.toLowerCase();
  return NETWORK_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

export interface DecisionPromptOptions {
  rules: string;
  instruction: string;
  /** `undefined` when the instruction does not depend on the network */
  online?: boolean;
}

export function buildDecisionPrompt({
  rules,
  instruction,
  online,
}: DecisionPromptOptions): string {
  const sections = [
    'You are a desktop automation assistant. You can see the current desktop screenshot and need to decide what single action to take based on the user\'s command.',
    `RULES AND GUIDELINES:\n${rules}`,
  ];

  if (online !== undefined) {
    sections.push(online ? ONLINE_NOTE : OFFLINE_NOTE);
  }

  sections.push(
    `USER COMMAND: ${instruction}`,
    `Analyze the screenshot and determine the appropriate action to fulfill the user's command. Consider:
1. What UI elements are visible on the screen
2. Where should I click or what should I type to accomplish the task
3. What is the most logical next step
4. If the command requires internet and it's not available, wait for connectivity

Respond ONLY with valid JSON in the exact format specified in the rules. Do not include any other text outside the JSON.`,
  );

  return sections.join('\n\n');
}

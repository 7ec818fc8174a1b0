import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  Instruction,
  InputInjector,
  ScreenCapturer,
  Screenshot,
} from '@deskpilot/shared';
import { AgentConfig, buildAgentConfig } from '../config/agent.config';
import {
  CaptureError,
  ExecutionError,
  InferenceError,
  SafetyViolation,
  ValidationError,
} from '../common/pipeline.errors';
import { CommandSourceService } from '../commands/command-source.service';
import { ConnectivityService } from '../connectivity/connectivity.service';
import { DecisionService } from '../decision/decision.service';
import { ActionExecutorService } from '../executor/action-executor.service';
import { OllamaService } from '../ollama/ollama.service';
import { SafetyGateService } from '../safety/safety-gate.service';
import { AgentProcessor } from './agent.processor';

function createInjector(): jest.Mocked<InputInjector> {
  return {
    moveTo: jest.fn().mockResolvedValue(undefined),
    click: jest.fn().mockResolvedValue(undefined),
    rightClick: jest.fn().mockResolvedValue(undefined),
    middleClick: jest.fn().mockResolvedValue(undefined),
    typeText: jest.fn().mockResolvedValue(undefined),
    pressKey: jest.fn().mockResolvedValue(undefined),
    pressCombo: jest.fn().mockResolvedValue(undefined),
    scroll: jest.fn().mockResolvedValue(undefined),
    getScreenSize: jest.fn().mockResolvedValue({ width: 1920, height: 1080 }),
    getCursorPosition: jest.fn().mockResolvedValue({ x: 0, y: 0 }),
  };
}

describe('AgentProcessor', () => {
  const screenshot: Screenshot = {
    base64: 'c2NyZWVu',
    mimeType: 'image/png',
    capturedAt: new Date(),
  };
  const instruction = (text: string): Instruction => ({ text, lineNumber: 1 });

  let tmpDir: string;
  let config: AgentConfig;
  let commandSource: CommandSourceService;
  let ollamaService: OllamaService;
  let safetyGate: SafetyGateService;
  let injector: jest.Mocked<InputInjector>;
  let capturer: jest.Mocked<ScreenCapturer>;
  let processor: AgentProcessor;
  let generate: jest.SpiedFunction<OllamaService['generate']>;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deskpilot-processor-'));
    config = buildAgentConfig({
      DESKPILOT_DATA_DIR: tmpDir,
      DESKPILOT_MIN_ACTION_INTERVAL_MS: '0',
      DESKPILOT_SETTLE_DELAY_MS: '0',
    });

    commandSource = new CommandSourceService(config);
    await commandSource.initialize();
    ollamaService = new OllamaService(config);
    generate = jest.spyOn(ollamaService, 'generate');
    const connectivityService = new ConnectivityService(config);
    jest.spyOn(connectivityService, 'isOnline').mockResolvedValue(true);

    injector = createInjector();
    capturer = { capture: jest.fn().mockResolvedValue(screenshot) };
    safetyGate = new SafetyGateService(config);

    processor = new AgentProcessor(
      commandSource,
      new DecisionService(ollamaService, connectivityService, config),
      safetyGate,
      new ActionExecutorService(injector, config),
      capturer,
      injector,
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('executes an approved click and records success', async () => {
    generate.mockResolvedValue('{"action":"click","coordinates":[500,400]}');

    const result = await processor.processInstruction(
      instruction('click ok button'),
    );

    expect(result.status).toBe('success');
    expect(result.lastState).toBe('executed');
    expect(result.outcome?.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(injector.moveTo).toHaveBeenCalledTimes(1);
    expect(injector.moveTo).toHaveBeenCalledWith(500, 400, 500);
    expect(injector.click).toHaveBeenCalledTimes(1);
    expect(commandSource.isAttempted('click ok button')).toBe(true);
  });

  it('records a deny-listed key combo as a failure without a key event', async () => {
    generate.mockResolvedValue(
      '{"action":"key","key":"win+r","reasoning":"open run dialog"}',
    );

    const result = await processor.processInstruction(
      instruction('open notepad'),
    );

    expect(result.status).toBe('failure');
    expect(result.lastState).toBe('decided');
    expect(result.decision).toEqual({
      action: 'key',
      key: 'win+r',
      reasoning: 'open run dialog',
    });
    expect(result.error).toBeInstanceOf(SafetyViolation);
    expect(injector.pressKey).not.toHaveBeenCalled();
    expect(injector.pressCombo).not.toHaveBeenCalled();
    expect(commandSource.isAttempted('open notepad')).toBe(true);
  });

  it('rejects a deny-listed combo padded with empty segments', async () => {
    generate.mockResolvedValue('{"action":"key","key":"alt+f4+"}');

    const result = await processor.processInstruction(
      instruction('close the window'),
    );

    expect(result.status).toBe('failure');
    expect(result.error).toBeInstanceOf(SafetyViolation);
    expect(result.error).toMatchObject({
      reason: 'key combination "alt+f4" is forbidden',
    });
    expect(injector.pressCombo).not.toHaveBeenCalled();
  });

  it('clicks the whole-pixel point the gate approved', async () => {
    generate.mockResolvedValue(
      '{"action":"click","coordinates":[500,1029.5]}',
    );

    const result = await processor.processInstruction(
      instruction('click the taskbar edge'),
    );

    expect(result.status).toBe('success');
    expect(injector.moveTo).toHaveBeenCalledWith(500, 1029, 500);
  });

  it('stops before the gate on an unparsable reply', async () => {
    generate.mockResolvedValue('I cannot find that on the screen.');
    const check = jest.spyOn(safetyGate, 'check');

    const result = await processor.processInstruction(
      instruction('click ok button'),
    );

    expect(result.status).toBe('failure');
    expect(result.lastState).toBe('captured');
    expect(result.decision).toBeUndefined();
    expect(result.error).toBeInstanceOf(InferenceError);
    expect(check).not.toHaveBeenCalled();
    expect(injector.moveTo).not.toHaveBeenCalled();
    expect(commandSource.isAttempted('click ok button')).toBe(true);
  });

  it('records a schema violation as a failure', async () => {
    generate.mockResolvedValue('{"action":"click"}');

    const result = await processor.processInstruction(
      instruction('click ok button'),
    );

    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.lastState).toBe('captured');
  });

  it('records a capture failure without asking the model', async () => {
    capturer.capture.mockRejectedValue(new Error('no display'));

    const result = await processor.processInstruction(
      instruction('click ok button'),
    );

    expect(result.status).toBe('failure');
    expect(result.lastState).toBe('polled');
    expect(result.error).toBeInstanceOf(CaptureError);
    expect(result.error?.message).toBe('Failed to capture screen: no display');
    expect(generate).not.toHaveBeenCalled();
    expect(commandSource.isAttempted('click ok button')).toBe(true);
  });

  it('records a transport failure', async () => {
    generate.mockRejectedValue(
      new InferenceError('timeout', 'Inference request timed out after 10ms'),
    );

    const result = await processor.processInstruction(
      instruction('click ok button'),
    );

    expect(result.status).toBe('failure');
    expect(result.error).toBeInstanceOf(InferenceError);
  });

  it('records an action the injector could not perform', async () => {
    generate.mockResolvedValue('{"action":"type","text":"hello"}');
    injector.typeText.mockRejectedValue(new Error('keyboard busy'));

    const result = await processor.processInstruction(
      instruction('type hello there'),
    );

    expect(result.status).toBe('failure');
    expect(result.lastState).toBe('executed');
    expect(result.outcome?.success).toBe(false);
    expect(result.error).toBeInstanceOf(ExecutionError);
    expect(result.error?.message).toBe('Failed to type: keyboard busy');
  });

  it('checks clicks against the current screen size', async () => {
    injector.getScreenSize.mockResolvedValue({ width: 800, height: 600 });
    generate.mockResolvedValue('{"action":"click","coordinates":[900,100]}');

    const result = await processor.processInstruction(
      instruction('click ok button'),
    );

    expect(result.error).toBeInstanceOf(SafetyViolation);
    expect(injector.click).not.toHaveBeenCalled();
  });

  it('writes every attempt to the record file', async () => {
    generate.mockResolvedValue('not json');

    await processor.processInstruction(instruction('click ok button'));
    await processor.processInstruction(instruction('open notepad'));

    const history = await commandSource.getHistory();
    expect(history.map((entry) => entry.instruction)).toEqual([
      'open notepad',
      'click ok button',
    ]);
  });
});

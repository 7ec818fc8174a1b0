import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import { Instruction, InstructionHistoryEntry } from '@deskpilot/shared';
import { agentConfig, AgentConfig } from '../config/agent.config';
import {
  errorCode,
  errorMessage,
  errorStack,
} from '../common/pipeline.errors';
import {
  formatFileStamp,
  formatTimestamp,
  parseTimestamp,
} from '../common/time.utils';
import {
  DEFAULT_COMMANDS_FILE_CONTENT,
  DESTRUCTIVE_INSTRUCTION_PATTERNS,
  MAX_INSTRUCTION_LENGTH,
  MIN_INSTRUCTION_TOKENS,
  PROCESSED_MARKER,
} from './commands.constants';

export interface CommandFileStatus {
  commandsFileExists: boolean;
  processedFileExists: boolean;
  commandsFileSize: number;
  processedFileSize: number;
  lastModified: Date | null;
  totalAttempted: number;
}

/**
 * Static checks applied to every candidate line. Returns the rejection
 * reason, or `null` when the line may be queued.
 */
export function validateInstruction(text: string): string | null {
  if (text.length > MAX_INSTRUCTION_LENGTH) {
    return `longer than ${MAX_INSTRUCTION_LENGTH} characters`;
  }

  const lowered = text.toLowerCase();
  const destructive = DESTRUCTIVE_INSTRUCTION_PATTERNS.find((pattern) =>
    lowered.includes(pattern),
  );
  if (destructive) {
    return `contains destructive pattern "${destructive}"`;
  }

  if (text.split(/\s+/).filter(Boolean).length < MIN_INSTRUCTION_TOKENS) {
    return `fewer than ${MIN_INSTRUCTION_TOKENS} words`;
  }

  return null;
}

function isCandidateLine(line: string): boolean {
  return line.length > 0 && !line.startsWith('#');
}

function isMissingFile(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

async function statOrNull(file: string): Promise<Stats | null> {
  try {
    return await fs.stat(file);
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Owns the queue file and the attempted-instruction log. No other
 * component reads or writes the attempted set.
 */
@Injectable()
export class CommandSourceService implements OnModuleInit {
  private readonly logger = new Logger(CommandSourceService.name);
  private readonly commandsFile: string;
  private readonly processedFile: string;
  private readonly attempted = new Set<string>();
  private lastFingerprint: string | null = null;

  constructor(@Inject(agentConfig.KEY) config: AgentConfig) {
    this.commandsFile = path.resolve(config.files.commandsFile);
    this.processedFile = path.resolve(config.files.processedFile);
  }

  async onModuleInit(): Promise<void> {
    await this.initialize();
  }

  async initialize(): Promise<void> {
    await fs.mkdir(path.dirname(this.commandsFile), { recursive: true });
    await fs.mkdir(path.dirname(this.processedFile), { recursive: true });

    try {
      await fs.writeFile(this.commandsFile, DEFAULT_COMMANDS_FILE_CONTENT, {
        encoding: 'utf-8',
        flag: 'wx',
      });
      this.logger.log(`Created default commands file: ${this.commandsFile}`);
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    }

    await this.loadAttempted();
  }

  private async loadAttempted(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.processedFile, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }

    for (const raw of content.split(/\r?\n/)) {
      const line = raw.trim();
      if (isCandidateLine(line)) {
        this.attempted.add(line);
      }
    }
    this.logger.debug(`Loaded ${this.attempted.size} attempted instructions`);
  }

  /**
   * Returns instructions not yet attempted, in file order. Returns `[]`
   * without reading the file when it has not changed since the last call.
   */
  async poll(): Promise<Instruction[]> {
    let fingerprint: string;
    try {
      const stat = await fs.stat(this.commandsFile);
      fingerprint = `${stat.mtimeMs}:${stat.size}`;
    } catch (error) {
      if (isMissingFile(error)) {
        this.lastFingerprint = null;
        return [];
      }
      throw error;
    }

    if (fingerprint === this.lastFingerprint) {
      return [];
    }

    const content = await fs.readFile(this.commandsFile, 'utf-8');
    this.lastFingerprint = fingerprint;

    const instructions: Instruction[] = [];
    content.split(/\r?\n/).forEach((raw, index) => {
      const text = raw.trim();
      if (!isCandidateLine(text) || this.attempted.has(text)) {
        return;
      }

      const rejection = validateInstruction(text);
      if (rejection) {
        this.logger.warn(
          `Invalid command at line ${index + 1} (${rejection}): ${text}`,
        );
        return;
      }

      instructions.push({ text, lineNumber: index + 1 });
    });

    if (instructions.length > 0) {
      this.logger.log(`Found ${instructions.length} new commands`);
    }

    return instructions;
  }

  /**
   * Records the instruction as attempted. The in-memory set is updated
   * before the append, so a failed write still keeps this process from
   * returning the instruction again.
   */
  async markAttempted(instruction: Instruction | string): Promise<void> {
    const text = typeof instruction === 'string' ? instruction : instruction.text;
    this.attempted.add(text);

    try {
      await fs.appendFile(
        this.processedFile,
        `${PROCESSED_MARKER}${formatTimestamp(new Date())}\n${text}\n`,
        'utf-8',
      );
      this.logger.debug(`Marked command as processed: ${text}`);
    } catch (error) {
      this.logger.error(
        `Failed to persist processed command "${text}": ${errorMessage(error)}`,
        errorStack(error),
      );
    }
  }

  isAttempted(text: string): boolean {
    return this.attempted.has(text);
  }

  async addInstruction(text: string): Promise<boolean> {
    const trimmed = text.trim();
    const rejection = validateInstruction(trimmed);
    if (!trimmed || rejection) {
      this.logger.error(`Invalid command (${rejection ?? 'empty'}): ${text}`);
      return false;
    }

    await fs.appendFile(this.commandsFile, `\n${trimmed}\n`, 'utf-8');
    this.logger.log(`Added command: ${trimmed}`);
    return true;
  }

  async removeInstruction(text: string): Promise<boolean> {
    let content: string;
    try {
      content = await fs.readFile(this.commandsFile, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }

    const lines = content.split('\n');
    const kept = lines.filter((line) => line.trim() !== text);
    if (kept.length === lines.length) {
      this.logger.warn(`Command not found for removal: ${text}`);
      return false;
    }

    await fs.writeFile(this.commandsFile, kept.join('\n'), 'utf-8');
    this.logger.log(`Removed command: ${text}`);
    return true;
  }

  /**
   * Forgets every attempted instruction and moves the record file aside.
   * Returns the archive path, if there was a file to archive.
   */
  async clearAttempted(): Promise<string | null> {
    this.attempted.clear();
    // The queue is re-read on the next poll so cleared lines surface again
    this.lastFingerprint = null;

    const archivePath = path.join(
      path.dirname(this.processedFile),
      `processed_commands_archive_${formatFileStamp(new Date())}.txt`,
    );
    try {
      await fs.rename(this.processedFile, archivePath);
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.log('Cleared processed commands list');
        return null;
      }
      throw error;
    }

    this.logger.log(`Archived processed commands to: ${archivePath}`);
    return archivePath;
  }

  /**
   * Attempted instructions with their timestamps, most recent first.
   */
  async getHistory(limit = 100): Promise<InstructionHistoryEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.processedFile, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const history: InstructionHistoryEntry[] = [];
    let processedAt: Date | null = null;
    for (const raw of content.split(/\r?\n/)) {
      const line = raw.trim();
      if (line.startsWith(PROCESSED_MARKER)) {
        processedAt = parseTimestamp(line.slice(PROCESSED_MARKER.length));
      } else if (isCandidateLine(line)) {
        history.push({ instruction: line, processedAt });
        processedAt = null;
      }
    }

    return history.reverse().slice(0, limit);
  }

  async getFileStatus(): Promise<CommandFileStatus> {
    const [commands, processed] = await Promise.all([
      statOrNull(this.commandsFile),
      statOrNull(this.processedFile),
    ]);

    return {
      commandsFileExists: commands !== null,
      processedFileExists: processed !== null,
      commandsFileSize: commands?.size ?? 0,
      processedFileSize: processed?.size ?? 0,
      lastModified: commands ? new Date(commands.mtimeMs) : null,
      totalAttempted: this.attempted.size,
    };
  }
}

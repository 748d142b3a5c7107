/**
 * FreeCadBridge - runs freecad_bridge.py in a FreeCAD-capable Python
 *
 * Every call is a fresh process: the script opens the document, applies the
 * given assignments, runs one command and prints a JSON reply on its last
 * stdout line.
 */

import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { delimiter, join } from 'path';
import { execa } from 'execa';
import { z } from 'zod';
import {
  AppError,
  CadSessionError,
  TimeoutError,
  ValidationError,
  createLogger,
  getFreeCadConfig,
  type ExportFormat,
  type FreeCadConfig,
} from '@cae/utils';

const logger = createLogger('cad:freecad');

export const BridgeParameterSchema = z.object({
  name: z.string(),
  value: z.number(),
  unit: z.string().optional(),
});

export const BridgeReplySchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    parameters: z.array(BridgeParameterSchema).optional(),
    output: z.string().optional(),
  }),
  z.object({
    ok: z.literal(false),
    error: z.string(),
  }),
]);

export type BridgeReply = z.infer<typeof BridgeReplySchema>;
export type BridgeParameter = z.infer<typeof BridgeParameterSchema>;
export type BridgeCommand = 'list' | 'rebuild' | 'export';

export interface BridgeRequest {
  command: BridgeCommand;
  document: string;
  assignments?: ReadonlyMap<string, number>;
  output?: string;
  format?: ExportFormat;
}

/**
 * Locate freecad_bridge.py beside the package sources, whether running from
 * src/ or from the compiled tree
 */
export function resolveBridgeScript(): string {
  const candidates = [
    fileURLToPath(new URL('../../python/freecad_bridge.py', import.meta.url)),
    join(process.cwd(), 'packages', 'cad', 'python', 'freecad_bridge.py'),
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0] ?? 'freecad_bridge.py';
}

/**
 * Pick the JSON reply out of stdout (FreeCAD prints its own chatter first)
 */
export function parseBridgeOutput(stdout: string): unknown {
  const lines = stdout.trim().split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = (lines[i] ?? '').trim();
    if (line.startsWith('{') && line.endsWith('}')) {
      try {
        return JSON.parse(line);
      } catch {
        // not the reply, keep looking upwards
        continue;
      }
    }
  }
  throw new ValidationError('FreeCAD bridge produced no JSON reply', {
    lastLines: lines.slice(-5).join('\n').substring(0, 500),
  });
}

export function buildBridgeArgs(scriptPath: string, request: BridgeRequest): string[] {
  const args = [scriptPath, request.command, '--document', request.document];
  for (const [name, value] of request.assignments ?? new Map<string, number>()) {
    args.push('--set', `${name}=${value}`);
  }
  if (request.output !== undefined) {
    args.push('--output', request.output);
  }
  if (request.format !== undefined) {
    args.push('--format', request.format);
  }
  return args;
}

interface ExecaFailure {
  timedOut?: boolean;
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  shortMessage?: string;
}

function isExecaFailure(error: unknown): error is Error & ExecaFailure {
  return error instanceof Error && ('exitCode' in error || 'timedOut' in error);
}

/**
 * FreeCadBridge
 */
export class FreeCadBridge {
  private readonly scriptPath: string;

  constructor(
    private readonly config: FreeCadConfig = getFreeCadConfig(),
    scriptPath?: string
  ) {
    this.scriptPath = scriptPath ?? resolveBridgeScript();
  }

  /**
   * Run one bridge command. Rejects with CadSessionError when FreeCAD refuses
   * the command, TimeoutError on deadline, ValidationError on a bad reply.
   */
  async run(request: BridgeRequest): Promise<Extract<BridgeReply, { ok: true }>> {
    const args = buildBridgeArgs(this.scriptPath, request);
    const env: Record<string, string> = {};
    if (this.config.libPath) {
      env.PYTHONPATH = [this.config.libPath, process.env.PYTHONPATH]
        .filter((p): p is string => Boolean(p))
        .join(delimiter);
    }

    logger.debug('Executing FreeCAD bridge', {
      python: this.config.python,
      command: request.command,
      document: request.document,
    });

    let stdout: string;
    try {
      const result = await execa(this.config.python, args, {
        env,
        timeout: this.config.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
        encoding: 'utf8',
      });
      stdout = result.stdout;
    } catch (error: unknown) {
      throw this.wrapProcessError(error, request.command);
    }

    const parsed = BridgeReplySchema.safeParse(parseBridgeOutput(stdout));
    if (!parsed.success) {
      throw new ValidationError(
        `FreeCAD bridge reply failed schema validation: ${parsed.error.message}`,
        { command: request.command, issues: parsed.error.issues }
      );
    }

    const reply = parsed.data;
    if (!reply.ok) {
      throw new CadSessionError(reply.error, request.command, { document: request.document });
    }
    return reply;
  }

  private wrapProcessError(error: unknown, command: BridgeCommand): AppError {
    if (isExecaFailure(error) && (error.timedOut === true || error.exitCode !== undefined)) {
      if (error.timedOut) {
        return new TimeoutError(
          `FreeCAD bridge timed out after ${this.config.timeoutMs}ms`,
          this.config.timeoutMs,
          { command }
        );
      }

      // the script still reports its own failures as JSON with a non-zero exit
      const stdout = error.stdout ?? '';
      const reply = stdout ? BridgeReplySchema.safeParse(safeParseOutput(stdout)) : undefined;
      if (reply?.success && !reply.data.ok) {
        return new CadSessionError(reply.data.error, command);
      }

      const stderr = (error.stderr ?? '').trim();
      return new CadSessionError(
        `FreeCAD bridge exited with code ${String(error.exitCode)}: ${stderr.split('\n').pop() || error.shortMessage || error.message}`,
        command,
        { exitCode: error.exitCode, stderr: stderr.substring(0, 1000) }
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new CadSessionError(`FreeCAD bridge failed to start: ${message}`, command, {
      python: this.config.python,
    });
  }
}

function safeParseOutput(stdout: string): unknown {
  try {
    return parseBridgeOutput(stdout);
  } catch (error) {
    logger.debug('No JSON reply in failed bridge output', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

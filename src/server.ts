import path from 'path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ToolRegistry, emptyInput, exportResultsInput, runStatusInput, runTestsInput } from './tool-registry.js';
import { buildPlan, formatCommand } from './plan/command-plan.js';
import { TEST_MODE_LABELS } from './plan/types.js';
import type { RunSupervisor } from './run/supervisor.js';
import type { LogBuffer } from './run/log-buffer.js';
import type { RunState } from './run/types.js';
import { armWatchdog } from './run/watchdog.js';
import type { ArtifactScanner } from './results/scanner.js';
import { listWaveforms } from './results/scanner.js';
import type { RunSummary } from './results/types.js';
import { exportResults } from './results/exporter.js';
import { checkEnvironment, clearResults, generateReport } from './project/maintenance.js';
import { HTSError, HTSErrorCode, describeError } from './shared/errors.js';
import { logger } from './shared/logger.js';
import type { SupervisorConfig } from './types/config.js';

export interface ServerContext {
  config: SupervisorConfig;
  resultsRoot: string;
  supervisor: RunSupervisor;
  scanner: ArtifactScanner;
  logBuffer: LogBuffer;
}

export type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

const respond = (text: string): ToolResponse => ({ content: [{ type: 'text' as const, text }] });

export function createServer(context: ServerContext): Server {
  const registry = new ToolRegistry();
  const dispatch = createDispatcher(context);

  const server = new Server(
    { name: 'hdl-test-supervisor', version: '1.0.0' },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.getAllTools().map(t => ({
      name: t.name,
      description: t.description,
      inputSchema: { ...zodToJsonSchema(t.inputSchema), type: 'object' as const },
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatch(name, args ?? {});
  });

  return server;
}

export function createDispatcher(context: ServerContext): (toolName: string, args: Record<string, unknown>) => Promise<ToolResponse> {
  const { config, resultsRoot, supervisor, scanner, logBuffer } = context;
  supervisor.subscribe(logBuffer);

  const rejectWhileRunning = (action: string): void => {
    if (supervisor.isBusy()) {
      throw new HTSError(HTSErrorCode.ALREADY_RUNNING, `Cannot ${action} while a run is in progress. Cancel it or wait.`);
    }
  };

  return async function dispatch(toolName, args) {
    try {
      switch (toolName) {

        // ── Run control ────────────────────────────────────────────────
        case 'hts_run_tests': {
          const { mode, testbench, autoReport } = runTestsInput.parse(args);
          const plan = buildPlan(mode, {
            testbench,
            autoReport: autoReport ?? config.auto_report,
            tool: config.build_tool,
            testbenches: config.testbenches,
          });
          supervisor.start(plan);
          // start() emits no lines synchronously, so nothing from this run is cleared.
          logBuffer.clear();
          armWatchdog(supervisor, config.run_timeout_seconds * 1000);
          return respond([
            `Run started: ${TEST_MODE_LABELS[mode]}${plan.testbench ? ` (${plan.testbench})` : ''}`,
            ``,
            `Commands:`,
            ...plan.commands.map((c, i) => `  ${i + 1}. ${formatCommand(c)}`),
            ``,
            `Poll hts_get_run_status for output.`,
          ].join('\n'));
        }

        case 'hts_cancel_run': {
          emptyInput.parse(args);
          if (supervisor.requestCancel()) return respond('Cancellation requested.');
          return respond(supervisor.isBusy() ? 'Cancellation already in progress.' : 'No run in progress.');
        }

        case 'hts_get_run_status': {
          const { sinceSeq } = runStatusInput.parse(args);
          const lines = logBuffer.since(sinceSeq);
          const lastSeq = lines.length > 0 ? lines[lines.length - 1].seq : sinceSeq;
          return respond([
            `State:    ${describeState(supervisor.getState())}`,
            `Last seq: ${lastSeq}`,
            ``,
            ...(lines.length > 0 ? lines.map(l => l.text) : ['(no new output)']),
          ].join('\n'));
        }

        // ── Results ────────────────────────────────────────────────────
        case 'hts_get_results': {
          emptyInput.parse(args);
          return respond(formatSummary(scanner.scan(resultsRoot)));
        }

        case 'hts_export_results': {
          const { destination } = exportResultsInput.parse(args);
          const target = path.resolve(config.project_root, destination);
          const summary = scanner.scan(resultsRoot);
          const document = await exportResults(summary, { timestamp: summary.timestamp, rootPath: config.project_root }, target);
          return respond(`Results exported to ${target} (${document.results.simulation.length} simulations).`);
        }

        case 'hts_list_waveforms': {
          emptyInput.parse(args);
          const files = listWaveforms(resultsRoot);
          return respond(files.length > 0
            ? files.join('\n')
            : 'No waveform files found. Run simulations first.');
        }

        // ── Project ────────────────────────────────────────────────────
        case 'hts_clear_results': {
          emptyInput.parse(args);
          rejectWhileRunning('clear results');
          await clearResults(config);
          return respond('Results cleared.');
        }

        case 'hts_generate_report': {
          emptyInput.parse(args);
          rejectWhileRunning('generate the report');
          const result = await generateReport(config);
          return respond(result.stdout.trim() || 'HTML report generated.');
        }

        case 'hts_check_environment': {
          emptyInput.parse(args);
          const result = await checkEnvironment(config);
          return respond([
            result.exitCode === 0 ? 'Environment check passed.' : `Environment check failed (exit ${result.exitCode}).`,
            ``,
            result.stdout.trim(),
            ...(result.stderr.trim() ? [``, `Errors:`, result.stderr.trim()] : []),
          ].join('\n'));
        }

        case 'hts_list_testbenches': {
          emptyInput.parse(args);
          return respond(config.testbenches.join('\n'));
        }

        default:
          return respond(`Unknown tool: ${toolName}`);
      }
    } catch (err) {
      if (err instanceof HTSError) {
        const ctxLines = err.context && Object.keys(err.context).length > 0
          ? '\n' + Object.entries(err.context).map(([k, v]) => `  ${k}: ${String(v)}`).join('\n')
          : '';
        return respond(`HTS Error [${err.code}]: ${err.message}${ctxLines}`);
      }
      if (err instanceof ZodError) {
        return respond(`HTS Error: Invalid arguments for ${toolName}: ${err.issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`);
      }
      logger.error({ err, toolName }, 'tool failed');
      return respond(`HTS Error: ${describeError(err)}`);
    }
  };
}

export function describeState(state: RunState): string {
  switch (state.status) {
    case 'idle':
      return 'Idle';
    case 'running':
      return `Running command ${state.commandIndex + 1}/${state.commandCount}: ${formatCommand(state.command)}`;
    case 'cancelling':
      return `Cancelling (command ${state.commandIndex + 1}/${state.commandCount})`;
    case 'completed':
      return state.cancelled ? 'Cancelled' : 'Completed';
    case 'failed':
      return `Failed at command ${state.commandIndex + 1}: ${state.reason}`;
  }
}

export function formatSummary(summary: RunSummary): string {
  const passing = summary.results.filter(r => r.status === 'pass').length;
  const failing = summary.results.length - passing;
  return [
    `Simulations: ${summary.counts.simulation} completed (${passing} passing, ${failing} failing)`,
    `Synthesis:   ${summary.counts.synthesis} modules`,
    `Coverage:    ${summary.counts.coverage} analyzed`,
    ...(summary.results.length > 0 ? [``, ...summary.results.map(r => `${r.status === 'pass' ? 'PASS' : 'FAIL'}  ${r.name}`)] : []),
  ].join('\n');
}

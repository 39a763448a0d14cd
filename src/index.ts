#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, resolveResultsRoot } from './config/loader.js';
import { ExecaProcessRunner } from './process/runner.js';
import { ArtifactScanner } from './results/scanner.js';
import { LogBuffer } from './run/log-buffer.js';
import { RunSupervisor } from './run/supervisor.js';
import { createServer } from './server.js';
import { logger } from './shared/logger.js';

async function main(): Promise<void> {
  const { config, configPath, fromFile } = loadConfig();
  logger.info({ configPath, fromFile, projectRoot: config.project_root }, 'Configuration loaded');

  const resultsRoot = resolveResultsRoot(config);
  const scanner = new ArtifactScanner();
  const supervisor = new RunSupervisor({
    runner: new ExecaProcessRunner({
      cancelGraceMs: config.cancel_grace_ms,
      drainTimeoutMs: config.drain_timeout_ms,
    }),
    scanner,
    resultsRoot,
    cwd: config.project_root,
  });

  const server = createServer({
    config,
    resultsRoot,
    supervisor,
    scanner,
    logBuffer: new LogBuffer(config.log_buffer_lines),
  });

  await server.connect(new StdioServerTransport());
  logger.info({ resultsRoot }, 'hdl-test-supervisor ready');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Server failed to start');
  process.exit(1);
});

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { defaultConfig, loadConfig, resolveResultsRoot } from '../../../src/config/loader.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hts-config-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('falls back to defaults when no config file exists', () => {
    const configPath = path.join(tmpDir, 'hts.config.yaml');
    const result = loadConfig(configPath, tmpDir);

    expect(result).toEqual({ config: defaultConfig(tmpDir), configPath, fromFile: false });
    expect(result.config.build_tool).toBe('make');
    expect(result.config.auto_report).toBe(true);
    expect(result.config.testbenches).toContain('tb_ieee1687_network');
  });

  it('merges file values over the defaults', async () => {
    const configPath = path.join(tmpDir, 'hts.config.yaml');
    await fs.writeFile(configPath, [
      'build_tool: gmake',
      'auto_report: false',
      'testbenches:',
      '  - tb_top_module',
      '  - tb_stress_test',
    ].join('\n'));

    const { config, fromFile } = loadConfig(configPath, '/somewhere/else');
    expect(fromFile).toBe(true);
    expect(config.build_tool).toBe('gmake');
    expect(config.auto_report).toBe(false);
    expect(config.testbenches).toEqual(['tb_top_module', 'tb_stress_test']);
    expect(config.cancel_grace_ms).toBe(5_000);
    expect(config.results_dir).toBe('results');
  });

  it('resolves a relative project_root against the config file location', async () => {
    const configPath = path.join(tmpDir, 'hts.config.yaml');
    await fs.writeFile(configPath, 'project_root: ./hw\nresults_dir: out/results\n');

    const { config } = loadConfig(configPath, '/somewhere/else');
    expect(config.project_root).toBe(path.join(tmpDir, 'hw'));
    expect(resolveResultsRoot(config)).toBe(path.join(tmpDir, 'hw', 'out', 'results'));
  });

  it('uses defaults when the file fails validation', async () => {
    const configPath = path.join(tmpDir, 'hts.config.yaml');
    await fs.writeFile(configPath, 'cancel_grace_ms: -5\n');

    expect(loadConfig(configPath, tmpDir)).toEqual({ config: defaultConfig(tmpDir), configPath, fromFile: false });
  });

  it('uses defaults when the file is not valid YAML', async () => {
    const configPath = path.join(tmpDir, 'hts.config.yaml');
    await fs.writeFile(configPath, 'build_tool: [unterminated\n');

    expect(loadConfig(configPath, tmpDir).fromFile).toBe(false);
  });

  it('treats an empty file as all defaults', async () => {
    const configPath = path.join(tmpDir, 'hts.config.yaml');
    await fs.writeFile(configPath, '');

    const { config, fromFile } = loadConfig(configPath, tmpDir);
    expect(fromFile).toBe(true);
    expect(config).toEqual(defaultConfig(tmpDir));
  });
});

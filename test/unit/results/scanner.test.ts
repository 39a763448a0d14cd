import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ArtifactScanner, listWaveforms } from '../../../src/results/scanner.js';

describe('ArtifactScanner', () => {
  const scanner = new ArtifactScanner();
  const now = new Date('2026-03-01T12:00:00Z');
  let root: string;

  async function writeArtifact(relPath: string, content = ''): Promise<void> {
    const file = path.join(root, relPath);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, 'utf-8');
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'hts-scan-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('returns zero counts for a missing results root', () => {
    expect(scanner.scan(path.join(root, 'does-not-exist'), now)).toEqual({
      counts: { simulation: 0, synthesis: 0, coverage: 0 },
      results: [],
      timestamp: now,
    });
  });

  it('returns zero counts for an empty results root', () => {
    expect(scanner.scan(root, now).counts).toEqual({ simulation: 0, synthesis: 0, coverage: 0 });
  });

  it('classifies a simulation log containing the success marker as a pass', async () => {
    await writeArtifact('simulation/logs/tb_top_module.log', 'VCD info: dumpfile\n...simulation successful...\n');

    const summary = scanner.scan(root, now);
    expect(summary.counts.simulation).toBe(1);
    expect(summary.results).toEqual([{ name: 'tb_top_module', status: 'pass', category: 'simulation' }]);
  });

  it('classifies logs without the marker as failures and orders results by name', async () => {
    await writeArtifact('simulation/logs/tb_loopback_module.log', 'ERROR: mismatch at 120ns\n');
    await writeArtifact('simulation/logs/tb_jtag_controller.log', 'All checks successful\n');
    await writeArtifact('simulation/logs/notes.txt', 'successful');
    await fs.mkdir(path.join(root, 'simulation/logs/archive.log'));

    expect(scanner.scan(root, now).results).toEqual([
      { name: 'tb_jtag_controller', status: 'pass', category: 'simulation' },
      { name: 'tb_loopback_module', status: 'fail', category: 'simulation' },
    ]);
  });

  it('counts synthesized netlists and coverage logs without per-item results', async () => {
    await writeArtifact('synthesis/jtag_controller_synth.v');
    await writeArtifact('synthesis/top_module_synth.v');
    await writeArtifact('synthesis/top_module.v');
    await writeArtifact('synthesis/yosys.log');
    await writeArtifact('coverage/tb_top_module.log');
    await writeArtifact('coverage/summary.html');

    const summary = scanner.scan(root, now);
    expect(summary.counts).toEqual({ simulation: 0, synthesis: 2, coverage: 1 });
    expect(summary.results).toEqual([]);
  });

  it('yields identical summaries for an unchanged tree', async () => {
    await writeArtifact('simulation/logs/tb_top_module.log', 'successful');
    await writeArtifact('synthesis/top_module_synth.v');

    expect(scanner.scan(root, now)).toEqual(scanner.scan(root, now));
  });

  it('reflects artifacts added after a previous scan', async () => {
    await writeArtifact('simulation/logs/tb_top_module.log', 'successful');
    expect(scanner.scan(root, now).counts.simulation).toBe(1);

    await writeArtifact('simulation/logs/tb_ieee1500_wrapper.log', 'timeout');
    const summary = scanner.scan(root, now);
    expect(summary.counts.simulation).toBe(2);
    expect(summary.results.map(r => [r.name, r.status])).toEqual([
      ['tb_ieee1500_wrapper', 'fail'],
      ['tb_top_module', 'pass'],
    ]);
  });

  it('leaves the artifacts untouched', async () => {
    await writeArtifact('simulation/logs/tb_top_module.log', 'successful');
    scanner.scan(root, now);

    await expect(fs.readFile(path.join(root, 'simulation/logs/tb_top_module.log'), 'utf-8')).resolves.toBe('successful');
  });

  it('treats a results path that is a file as empty', async () => {
    await writeArtifact('simulation', 'not a directory');
    expect(scanner.scan(root, now).counts.simulation).toBe(0);
  });
});

describe('listWaveforms', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'hts-wave-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists vcd files by name', async () => {
    const dir = path.join(root, 'simulation', 'waveforms');
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, 'tb_top_module.vcd'), '');
    await fs.writeFile(path.join(dir, 'tb_jtag_controller.vcd'), '');
    await fs.writeFile(path.join(dir, 'tb_jtag_controller.gtkw'), '');

    expect(listWaveforms(root)).toEqual([
      path.join(dir, 'tb_jtag_controller.vcd'),
      path.join(dir, 'tb_top_module.vcd'),
    ]);
  });

  it('returns an empty list when there is no waveform directory', () => {
    expect(listWaveforms(root)).toEqual([]);
  });
});

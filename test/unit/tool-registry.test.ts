import { ToolRegistry, runStatusInput, runTestsInput } from '../../src/tool-registry.js';

describe('ToolRegistry', () => {
  it('getAllTools returns run, result and project tools', () => {
    const registry = new ToolRegistry();
    // 3 run + 3 result + 4 project = 10 total
    expect(registry.getAllTools()).toHaveLength(10);
  });

  it('exposes every operation under a unique hts_ name', () => {
    const names = new ToolRegistry().getAllTools().map(t => t.name);
    expect(new Set(names).size).toBe(names.length);
    expect(names).toEqual(expect.arrayContaining([
      'hts_run_tests',
      'hts_cancel_run',
      'hts_get_run_status',
      'hts_get_results',
      'hts_export_results',
      'hts_clear_results',
    ]));
    expect(names.every(n => n.startsWith('hts_'))).toBe(true);
  });

  it('get returns undefined for an unknown tool', () => {
    expect(new ToolRegistry().get('hts_nope')).toBeUndefined();
    expect(new ToolRegistry().get('hts_cancel_run')?.name).toBe('hts_cancel_run');
  });
});

describe('tool input schemas', () => {
  it('runTestsInput accepts a known mode and rejects anything else', () => {
    expect(runTestsInput.parse({ mode: 'testbench', testbench: 'tb_top_module' }))
      .toEqual({ mode: 'testbench', testbench: 'tb_top_module' });
    expect(runTestsInput.safeParse({ mode: 'gui' }).success).toBe(false);
  });

  it('runStatusInput defaults sinceSeq to -1', () => {
    expect(runStatusInput.parse({})).toEqual({ sinceSeq: -1 });
  });
});

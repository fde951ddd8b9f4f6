import { describe, it, expect } from 'vitest';
import {
  StaticConfigurationSource,
  FileConfigurationSource,
  parseFiltersFile,
  detectFormat,
} from './config-loader.js';
import { ConfigurationError } from '../types/errors.js';
import { createMemoryFs } from '../testing/factories.js';

const LOGIN = 'org.platform.learning.student.login.requested.v1';
const ENROLL = 'org.platform.learning.course.enrollment.started.v1';

// ---------------------------------------------------------------------------
// StaticConfigurationSource
// ---------------------------------------------------------------------------

describe('StaticConfigurationSource', () => {
  it('returns configured values and undefined for others', () => {
    const source = new StaticConfigurationSource({ [LOGIN]: ['audit'] });
    expect(source.getConfig(LOGIN)).toEqual(['audit']);
    expect(source.getConfig(ENROLL)).toBeUndefined();
  });

  it('can be changed between runs', () => {
    const source = new StaticConfigurationSource();
    source.set(LOGIN, 'audit');
    source.set(ENROLL, { pipeline: ['a'] });
    expect(source.filterTypes()).toEqual([LOGIN, ENROLL]);
    expect(source.delete(LOGIN)).toBe(true);
    expect(source.filterTypes()).toEqual([ENROLL]);
  });
});

// ---------------------------------------------------------------------------
// detectFormat()
// ---------------------------------------------------------------------------

describe('detectFormat', () => {
  it('maps extensions to formats', () => {
    expect(detectFormat('/etc/hookrail.yaml')).toBe('yaml');
    expect(detectFormat('/etc/hookrail.YML')).toBe('yaml');
    expect(detectFormat('/etc/hookrail.json')).toBe('json');
    expect(detectFormat('/etc/hookrail.toml')).toBe('toml');
    expect(detectFormat('/etc/hookrail')).toBe('toml');
  });
});

// ---------------------------------------------------------------------------
// parseFiltersFile()
// ---------------------------------------------------------------------------

describe('parseFiltersFile', () => {
  it('parses TOML tables, lists and strings', () => {
    const file = parseFiltersFile(
      `
[filters]
"${ENROLL}" = "./steps.js#stamp"

[filters."${LOGIN}"]
pipeline = ["./steps.js#audit", "./steps.js#block"]
fail_silently = false
log_level = "debug"
`,
      'toml',
    );
    expect(file.filters).toEqual({
      [ENROLL]: './steps.js#stamp',
      [LOGIN]: {
        pipeline: ['./steps.js#audit', './steps.js#block'],
        fail_silently: false,
        log_level: 'debug',
      },
    });
  });

  it('parses YAML and JSON', () => {
    expect(
      parseFiltersFile(`filters:\n  ${LOGIN}:\n    - ./steps.js#audit\n  ${ENROLL}:\n`, 'yaml').filters,
    ).toEqual({ [LOGIN]: ['./steps.js#audit'], [ENROLL]: null });
    expect(
      parseFiltersFile(JSON.stringify({ filters: { [LOGIN]: { pipeline: 'a' } } }), 'json').filters,
    ).toEqual({ [LOGIN]: { pipeline: 'a' } });
  });

  it('accepts a table whose YAML pipeline is left empty', () => {
    expect(
      parseFiltersFile(`filters:\n  ${LOGIN}:\n    pipeline:\n    fail_silently: false\n`, 'yaml').filters,
    ).toEqual({ [LOGIN]: { pipeline: null, fail_silently: false } });
  });

  it('keeps other top-level sections', () => {
    const file = parseFiltersFile('[service]\nname = "lms"\n', 'toml');
    expect(file).toEqual({ service: { name: 'lms' }, filters: {} });
  });

  it('treats empty content as no filters', () => {
    expect(parseFiltersFile('', 'toml')).toEqual({ filters: {} });
    expect(parseFiltersFile('  \n', 'yaml')).toEqual({ filters: {} });
    expect(parseFiltersFile('# nothing here\n', 'yaml')).toEqual({ filters: {} });
  });

  it('reports syntax errors with the format name', () => {
    expect(() => parseFiltersFile('[filters\n', 'toml')).toThrow(/^Invalid TOML config: /);
    expect(() => parseFiltersFile('{"filters": ', 'json')).toThrow(/^Invalid JSON config: /);
  });

  it('reports schema violations', () => {
    expect(() => parseFiltersFile('{"filters": []}', 'json')).toThrow(
      new ConfigurationError('Config does not match schema: /filters must be object'),
    );
    expect(() => parseFiltersFile(`filters = { "${LOGIN}" = 5 }`, 'toml')).toThrow(
      /^Config does not match schema: \/filters\//,
    );
    expect(() =>
      parseFiltersFile(JSON.stringify({ filters: { [LOGIN]: { fail_silently: 'no' } } }), 'json'),
    ).toThrow(ConfigurationError);
  });
});

// ---------------------------------------------------------------------------
// FileConfigurationSource
// ---------------------------------------------------------------------------

describe('FileConfigurationSource', () => {
  it('reads the file on every lookup', () => {
    const fs = createMemoryFs({ '/etc/hookrail.toml': `[filters]\n"${LOGIN}" = ["a"]\n` });
    const source = new FileConfigurationSource('/etc/hookrail.toml', { fs });

    expect(source.getConfig(LOGIN)).toEqual(['a']);
    fs.files['/etc/hookrail.toml'] = `[filters]\n"${LOGIN}" = ["a", "b"]\n`;
    expect(source.getConfig(LOGIN)).toEqual(['a', 'b']);
  });

  it('lists configured filter types', () => {
    const fs = createMemoryFs({
      '/etc/hookrail.yaml': `filters:\n  ${LOGIN}: a\n  ${ENROLL}: b\n`,
    });
    const source = new FileConfigurationSource('/etc/hookrail.yaml', { fs });
    expect(source.format).toBe('yaml');
    expect(source.filterTypes()).toEqual([LOGIN, ENROLL]);
  });

  it('treats a missing file as no filters', () => {
    const source = new FileConfigurationSource('/etc/missing.toml', { fs: createMemoryFs() });
    expect(source.load()).toEqual({ filters: {} });
    expect(source.getConfig(LOGIN)).toBeUndefined();
  });

  it('does not resolve inherited object keys as filter types', () => {
    const fs = createMemoryFs({ '/etc/hookrail.json': '{"filters": {}}' });
    const source = new FileConfigurationSource('/etc/hookrail.json', { fs });
    expect(source.getConfig('toString')).toBeUndefined();
  });

  it('honours an explicit format', () => {
    const fs = createMemoryFs({ '/etc/filters.conf': `{"filters": {"${LOGIN}": "a"}}` });
    const source = new FileConfigurationSource('/etc/filters.conf', { fs, format: 'json' });
    expect(source.getConfig(LOGIN)).toBe('a');
  });
});

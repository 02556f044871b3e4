import { describe, it, expect } from 'vitest';
import { DETECTION_ORDER, FORMAT_HANDLERS, detectFormat, getHandler } from '../../src/formats/index.js';
import { getAt, removeAt, setAt } from '../../src/formats/shared.js';
import { MalformedConfigError } from '../../src/utils/errors.js';
import type { JsonObject } from '../../src/types/canonical.js';
import { canonicalOf, server } from '../helpers.js';

describe('detectFormat', () => {
  it('should classify a document with mcpServers as Claude even when mcp.servers is also present', () => {
    const doc: JsonObject = { mcpServers: {}, mcp: { servers: {} } };
    expect(detectFormat(doc).kind).toBe('claude');
  });

  it('should classify mcp.servers among other settings as VSCode', () => {
    const doc: JsonObject = { 'editor.fontSize': 14, mcp: { servers: {} } };
    expect(detectFormat(doc).kind).toBe('vscode');
  });

  it('should classify a bare mcp block with servers as standard', () => {
    expect(detectFormat({ mcp: { servers: {} } }).kind).toBe('standard');
    expect(detectFormat({ mcp: { format: 'cursor', servers: {} } }).kind).toBe('standard');
  });

  it('should fall back to legacy for empty and unrecognized documents', () => {
    expect(detectFormat({}).kind).toBe('legacy');
    expect(detectFormat({ 'editor.fontSize': 14 }).kind).toBe('legacy');
    expect(detectFormat({ mcp: { server_endpoint: 'http://localhost:8000/mcp' } }).kind).toBe('legacy');
  });

  it('should try handlers from most specific to the catch-all', () => {
    expect(DETECTION_ORDER).toEqual(['claude', 'vscode', 'standard', 'legacy']);
    expect(FORMAT_HANDLERS.legacy.detect({ mcpServers: {} })).toBe(true);
  });
});

describe('extract', () => {
  it('should apply defaults for missing args and env', () => {
    const config = getHandler('claude').extract({
      mcpServers: { git: { command: 'uvx' } },
    });

    expect(config.format).toBe('claude');
    expect(config.servers.get('git')).toEqual({
      name: 'git',
      command: 'uvx',
      args: [],
      env: {},
      extra: {},
    });
  });

  it('should keep unknown entry fields as passthrough', () => {
    const config = getHandler('standard').extract({
      mcp: { servers: { fs: { command: 'npx', args: ['-y', 'server-fs'], type: 'stdio', disabled: false } } },
    });

    expect(config.servers.get('fs')?.extra).toEqual({ type: 'stdio', disabled: false });
  });

  it('should preserve server order', () => {
    const config = getHandler('claude').extract({
      mcpServers: { zeta: { command: 'z' }, alpha: { command: 'a' }, mid: { command: 'm' } },
    });

    expect([...config.servers.keys()]).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('should return an empty config when the collection is absent', () => {
    const config = getHandler('legacy').extract({ 'editor.fontSize': 14 });
    expect(config.servers.size).toBe(0);
  });

  it('should reject an entry without a command', () => {
    expect(() => getHandler('claude').extract({ mcpServers: { broken: { args: ['x'] } } }))
      .toThrow(MalformedConfigError);
    expect(() => getHandler('claude').extract({ mcpServers: { broken: { args: ['x'] } } }))
      .toThrow('Server "broken" in "mcpServers"');
  });

  it('should reject an empty command', () => {
    expect(() => getHandler('standard').extract({ mcp: { servers: { blank: { command: '' } } } }))
      .toThrow(MalformedConfigError);
  });

  it('should reject a collection that is not an object', () => {
    expect(() => getHandler('claude').extract({ mcpServers: [] }))
      .toThrow('"mcpServers" must be an object of server entries');
  });

  it('should reject non-string args and env values', () => {
    expect(() => getHandler('vscode').extract({ a: 1, mcp: { servers: { s: { command: 'x', args: [1] } } } }))
      .toThrow(MalformedConfigError);
    expect(() => getHandler('claude').extract({ mcpServers: { s: { command: 'x', env: { PORT: 8080 } } } }))
      .toThrow(MalformedConfigError);
  });

  it('should reject an entry that is not an object', () => {
    expect(() => getHandler('claude').extract({ mcpServers: { s: 'npx server' } }))
      .toThrow('Server "s" in "mcpServers" must be an object');
  });
});

describe('merge', () => {
  const canonical = canonicalOf([
    server('git', 'uvx', ['mcp-server-git'], { GIT_DIR: '/repo' }),
    server('time', 'npx', []),
  ]);

  it('should round-trip through every handler without losing information', () => {
    for (const kind of DETECTION_ORDER) {
      const handler = getHandler(kind);
      const extracted = handler.extract(handler.merge({ 'editor.tabSize': 2 }, canonical));

      expect([...extracted.servers.values()]).toEqual([...canonical.servers.values()]);
    }
  });

  it('should keep every unrelated key and its position', () => {
    const filesExclude = { '**/.git': true };
    const doc: JsonObject = {
      'editor.fontSize': 14,
      'files.exclude': filesExclude,
      mcp: { format: 'vscode', servers: { old: { command: 'old' } } },
      'workbench.colorTheme': 'Default Dark+',
    };

    const merged = getHandler('vscode').merge(doc, canonical);

    expect(Object.keys(merged)).toEqual(['editor.fontSize', 'files.exclude', 'mcp', 'workbench.colorTheme']);
    expect(merged['files.exclude']).toBe(filesExclude);
    expect(merged['workbench.colorTheme']).toBe('Default Dark+');
    expect(getAt(merged, ['mcp', 'format'])).toBe('vscode');
    expect(getAt(merged, ['mcp', 'servers'])).toEqual({
      git: { command: 'uvx', args: ['mcp-server-git'], env: { GIT_DIR: '/repo' } },
      time: { command: 'npx' },
    });
  });

  it('should not mutate the input document', () => {
    const doc: JsonObject = { mcpServers: { old: { command: 'old' } }, globalShortcut: 'Ctrl+Space' };
    const before = structuredClone(doc);

    getHandler('claude').merge(doc, canonical);

    expect(doc).toEqual(before);
  });

  it('should re-emit passthrough fields into the schema they came from', () => {
    const doc: JsonObject = { mcpServers: { fs: { command: 'npx', disabled: true } } };
    const claude = getHandler('claude');

    const merged = claude.merge({}, claude.extract(doc));

    expect(merged).toEqual({ mcpServers: { fs: { command: 'npx', disabled: true } } });
  });

  it('should drop passthrough fields when writing another schema', () => {
    const extracted = getHandler('claude').extract({ mcpServers: { fs: { command: 'npx', disabled: true } } });

    const merged = getHandler('standard').merge({}, extracted);

    expect(merged).toEqual({ mcp: { servers: { fs: { command: 'npx' } } } });
  });

  it('should replace a non-object mcp value', () => {
    const merged = getHandler('standard').merge({ mcp: 'enabled' }, canonicalOf([server('a', 'run-a')]));
    expect(merged).toEqual({ mcp: { servers: { a: { command: 'run-a' } } } });
  });

  it('should keep legacy endpoint settings next to the new servers', () => {
    const merged = getHandler('legacy').merge(
      { mcp: { server_endpoint: 'http://localhost:8000/mcp' } },
      canonicalOf([server('a', 'run-a')])
    );

    expect(merged).toEqual({
      mcp: { server_endpoint: 'http://localhost:8000/mcp', servers: { a: { command: 'run-a' } } },
    });
  });
});

describe('document path helpers', () => {
  it('should set nested values in place of existing keys', () => {
    expect(Object.keys(setAt({ a: 1, mcp: {}, z: 2 }, ['mcp', 'servers'], {}))).toEqual(['a', 'mcp', 'z']);
  });

  it('should remove a collection and the parent it leaves empty', () => {
    expect(removeAt({ other: 1, mcp: { servers: {} } }, ['mcp', 'servers'])).toEqual({ other: 1 });
    expect(removeAt({ mcp: { format: 'x', servers: {} } }, ['mcp', 'servers'])).toEqual({ mcp: { format: 'x' } });
    expect(removeAt({ mcpServers: {}, keep: true }, ['mcpServers'])).toEqual({ keep: true });
  });

  it('should leave documents without the path untouched', () => {
    const doc: JsonObject = { mcp: 'enabled' };
    expect(removeAt(doc, ['mcp', 'servers'])).toBe(doc);
    expect(getAt(doc, ['mcp', 'servers'])).toBeUndefined();
  });
});

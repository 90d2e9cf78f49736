import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { fromDirectory, fromManifest } from '../src/createManifestDescriptor';
import { ErrorKind } from '../src/errors';
import { decodeDataUri } from '../src/resources/dataUri';
import { DirectoryResourceProvider } from '../src/resources/DirectoryResourceProvider';
import { ExtensionResources } from '../src/resources/ExtensionResources';
import { MemoryResourceProvider } from '../src/resources/MemoryResourceProvider';
import { fileExtension, normalizeResourcePath } from '../src/resources/paths';
import { manifestV3 } from './fixtures';

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe('normalizeResourcePath', () => {
  it.each([
    ['/images/icon.png', 'images/icon.png'],
    ['images\\icon.png', 'images/icon.png'],
    ['images/./nested/../icon.png', 'images/icon.png'],
    ['images/my%20icon.png', 'images/my icon.png'],
  ])('%s → %s', (input, expected) => {
    expect(normalizeResourcePath(input)).toBe(expected);
  });

  it.each(['', '/', '.', '..', '../secret.txt', 'images/../../secret.txt', '%2e%2e/secret.txt'])('rejects %j', (input) => {
    expect(normalizeResourcePath(input)).toBeUndefined();
  });

  it('reads file extensions in lowercase', () => {
    expect(fileExtension('images/Icon.PNG')).toBe('png');
    expect(fileExtension('README')).toBe('');
  });
});

describe('decodeDataUri', () => {
  it('decodes base64 payloads', () => {
    const decoded = decodeDataUri('data:text/plain;base64,aGVsbG8=');

    expect(decoded?.mimeType).toBe('text/plain');
    expect(decoded && text(decoded.data)).toBe('hello');
  });

  it('percent-decodes plain payloads', () => {
    const decoded = decodeDataUri('data:text/plain,hello%20world');

    expect(decoded && text(decoded.data)).toBe('hello world');
  });

  it('yields no bytes for a bare scheme', () => {
    expect(decodeDataUri('data:')).toEqual({ mimeType: '', data: new Uint8Array() });
  });

  it('ignores other URIs', () => {
    expect(decodeDataUri('https://example.com/')).toBeUndefined();
  });
});

describe('MemoryResourceProvider', () => {
  it('serializes JSON values and stores text', () => {
    const provider = new MemoryResourceProvider({ 'data.json': { a: 1 }, 'note.txt': 'hi' });

    expect(provider.text('data.json')).toEqual({ found: true, data: '{"a":1}' });
    expect(provider.text('/note.txt')).toEqual({ found: true, data: 'hi' });
  });

  it('separates missing from invalid paths', () => {
    const provider = new MemoryResourceProvider();

    expect(provider.bytes('nothing.txt')).toEqual({ found: false, reason: 'missing' });
    expect(provider.bytes('../escape.txt')).toEqual({ found: false, reason: 'invalid-path' });
  });

  it('refuses to store under an invalid path', () => {
    expect(() => new MemoryResourceProvider({ '../escape.txt': 'x' })).toThrow('Invalid resource path "../escape.txt"');
  });
});

describe('ExtensionResources', () => {
  it('reports missing resources with the path', () => {
    const resources = new ExtensionResources(new MemoryResourceProvider());

    const result = resources.data('/missing.js');

    expect(result.found).toBe(false);
    expect(!result.found && result.error?.kind).toBe(ErrorKind.ResourceNotFound);
    expect(!result.found && result.error?.message).toBe('Unable to find "missing.js" in the extension’s resources.');
  });

  it('names invalid paths', () => {
    const resources = new ExtensionResources(new MemoryResourceProvider());

    const result = resources.data('../outside.js');

    expect(!result.found && result.error?.message).toBe(
      'Unable to find "../outside.js" in the extension’s resources. It is an invalid path.',
    );
  });

  it('suppresses not-found errors on request', () => {
    const resources = new ExtensionResources(new MemoryResourceProvider());

    expect(resources.data('missing.js', { suppressNotFound: true })).toEqual({ found: false });
  });

  it('serves cached bytes after the provider changes', () => {
    const provider = new MemoryResourceProvider({ 'a.txt': 'first' });
    const resources = new ExtensionResources(provider);

    resources.data('a.txt', { cache: true });
    provider.set('a.txt', 'second');

    expect(resources.string('a.txt')).toEqual({ found: true, data: 'first' });
  });

  it('prefers the generated source for its path', () => {
    const resources = new ExtensionResources(new MemoryResourceProvider({ 'worker.js': 'on disk' }), (path) =>
      path === 'worker.js' ? { path, content: 'generated' } : undefined,
    );

    expect(resources.string('/worker.js')).toEqual({ found: true, data: 'generated' });
  });

  it('reads data URIs without the provider', () => {
    const resources = new ExtensionResources(new MemoryResourceProvider());

    expect(resources.string('data:text/plain,inline')).toEqual({ found: true, data: 'inline' });
  });
});

describe('descriptor resources', () => {
  it('returns resource errors to the caller without recording them', () => {
    const descriptor = fromManifest(manifestV3(), { 'popup.html': '<p>popup</p>' });

    expect(descriptor.resourceString('popup.html')).toEqual({ found: true, data: '<p>popup</p>' });
    expect(descriptor.resourceString('gone.html').found).toBe(false);
    expect(descriptor.errors()).toEqual([]);
  });
});

describe('DirectoryResourceProvider', () => {
  let root: string;

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'extent-'));
    await fs.outputJson(path.join(root, 'extension', 'manifest.json'), manifestV3({ background: { service_worker: 'worker.js' } }));
    await fs.outputFile(path.join(root, 'extension', 'worker.js'), 'self.onmessage = () => {};');
    await fs.outputFile(path.join(root, 'secret.txt'), 'outside');
  });

  afterAll(async () => {
    await fs.remove(root);
  });

  it('reads files under the root', () => {
    const provider = new DirectoryResourceProvider(path.join(root, 'extension'));

    expect(provider.text('worker.js')).toEqual({ found: true, data: 'self.onmessage = () => {};' });
  });

  it('refuses paths outside the root', () => {
    const provider = new DirectoryResourceProvider(path.join(root, 'extension'));

    expect(provider.bytes('../secret.txt')).toEqual({ found: false, reason: 'invalid-path' });
  });

  it('treats directories as missing', () => {
    const provider = new DirectoryResourceProvider(root);

    expect(provider.bytes('extension')).toEqual({ found: false, reason: 'missing' });
  });

  it('resolves a descriptor from an unpacked directory', () => {
    const descriptor = fromDirectory(path.join(root, 'extension'));

    expect(descriptor.displayName()).toBe('Reader');
    expect(descriptor.backgroundContentPath()).toBe('worker.js');
    expect(descriptor.errors()).toEqual([]);
  });
});

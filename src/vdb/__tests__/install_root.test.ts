import { describe, it, expect } from 'vitest';
import { resolveInstallPath, toInstallPath } from '../install_root.js';

describe('install root mapping', () => {
  it('leaves paths alone for the default root', () => {
    expect(resolveInstallPath('/', '/usr/bin/foo')).toBe('/usr/bin/foo');
    expect(toInstallPath('/', '/usr/bin/foo')).toBe('/usr/bin/foo');
  });

  it('prefixes and strips an offset root', () => {
    expect(resolveInstallPath('/mnt/image', '/usr/lib64/libbar.so.1')).toBe('/mnt/image/usr/lib64/libbar.so.1');
    expect(toInstallPath('/mnt/image/', '/mnt/image/usr/lib64/libbar.so.1')).toBe('/usr/lib64/libbar.so.1');
  });

  it('returns paths outside the root unchanged', () => {
    expect(toInstallPath('/mnt/image', '/opt/other/bin/tool')).toBe('/opt/other/bin/tool');
  });
});

import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { mockedFs, mockExecFileAsync, setPlatform } from './test-utils.js';
import { KeychainSecretStore } from '../../../secrets/keychain-secret-store.js';

const originalPlatform = process.platform;

describe('KeychainSecretStore', () => {
  let store: KeychainSecretStore;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new KeychainSecretStore({ fallbackDir: '/tmp/bandkit-test/secrets' });
  });

  afterAll(() => {
    setPlatform(originalPlatform);
  });

  describe('macOS', () => {
    beforeEach(() => {
      setPlatform('darwin');
    });

    it('stores the secret in the keychain', async () => {
      mockExecFileAsync.mockResolvedValue({ stdout: '', stderr: '' });

      await store.set('OPENBAND', 'access_token', 'T1');

      expect(mockExecFileAsync).toHaveBeenCalledWith('security', [
        'add-generic-password',
        '-a',
        'bandkit:OPENBAND:access_token',
        '-s',
        'bandkit',
        '-w',
        'T1',
        '-U',
      ]);
      expect(mockedFs.writeFile).not.toHaveBeenCalled();
    });

    it('reads the trimmed keychain value', async () => {
      mockExecFileAsync.mockResolvedValue({ stdout: 'T1\n', stderr: '' });

      expect(await store.get('OPENBAND', 'access_token')).toBe('T1');
    });

    it('falls back to the file when the keychain write fails', async () => {
      mockExecFileAsync.mockRejectedValue(new Error('Keychain error'));
      mockedFs.mkdir.mockResolvedValue(undefined);
      mockedFs.writeFile.mockResolvedValue(undefined);

      await store.set('OPENBAND', 'access_token', 'T1');

      expect(mockedFs.mkdir).toHaveBeenCalledWith('/tmp/bandkit-test/secrets', {
        recursive: true,
        mode: 0o700,
      });
      expect(mockedFs.writeFile).toHaveBeenCalledWith(
        expect.stringMatching(/^\/tmp\/bandkit-test\/secrets\/secret-[0-9a-f]{16}$/),
        'T1',
        { mode: 0o600 },
      );
    });
  });

  describe('Windows', () => {
    beforeEach(() => {
      setPlatform('win32');
    });

    const vaultKey = '"bandkit", "bandkit:OPENBAND:access_token"';

    function script(callIndex: number): string {
      const args: unknown = mockExecFileAsync.mock.calls[callIndex][1];
      return Array.isArray(args) ? String(args[3]) : '';
    }

    it('stores the secret in the PasswordVault without putting it on the command line', async () => {
      mockExecFileAsync.mockResolvedValue({ stdout: '', stderr: '' });

      await store.set('OPENBAND', 'access_token', 'T1');

      expect(mockExecFileAsync).toHaveBeenCalledWith(
        'powershell',
        ['-NoProfile', '-NonInteractive', '-Command', expect.any(String)],
        { env: expect.objectContaining({ BANDKIT_SECRET_VALUE: 'T1' }) },
      );
      expect(script(0)).toContain(
        `$vault.Add((New-Object Windows.Security.Credentials.PasswordCredential(${vaultKey}, $env:BANDKIT_SECRET_VALUE)));`,
      );
      expect(script(0)).not.toContain('T1');
      expect(mockedFs.writeFile).not.toHaveBeenCalled();
    });

    it('reads back through the same resource and user it stored under', async () => {
      mockExecFileAsync.mockResolvedValueOnce({ stdout: '', stderr: '' });
      mockExecFileAsync.mockResolvedValueOnce({ stdout: 'T1\r\n', stderr: '' });

      await store.set('OPENBAND', 'access_token', 'T1');
      const value = await store.get('OPENBAND', 'access_token');

      expect(value).toBe('T1');
      expect(script(0)).toContain(`$vault.Retrieve(${vaultKey})`);
      expect(script(1)).toContain(`$cred = $vault.Retrieve(${vaultKey});`);
      expect(mockedFs.readFile).not.toHaveBeenCalled();
    });

    it('deletes the credential and the fallback file', async () => {
      mockExecFileAsync.mockResolvedValue({ stdout: '', stderr: '' });
      mockedFs.unlink.mockResolvedValue(undefined);

      await store.delete('OPENBAND', 'access_token');

      expect(script(0)).toContain(`$vault.Remove($vault.Retrieve(${vaultKey}));`);
      expect(mockedFs.unlink).toHaveBeenCalledTimes(1);
    });
  });

  describe('Linux', () => {
    beforeEach(() => {
      setPlatform('linux');
    });

    it('reads from the file fallback', async () => {
      mockedFs.readFile.mockResolvedValue('T1\n');

      expect(await store.get('OPENBAND', 'access_token')).toBe('T1');
      expect(mockExecFileAsync).not.toHaveBeenCalled();
    });

    it('returns null when nothing is stored', async () => {
      mockedFs.readFile.mockRejectedValue(Object.assign(new Error('missing'), { code: 'ENOENT' }));

      expect(await store.get('OPENBAND', 'access_token')).toBeNull();
    });

    it('ignores a missing file on delete', async () => {
      mockedFs.unlink.mockRejectedValue(Object.assign(new Error('missing'), { code: 'ENOENT' }));

      await expect(store.delete('OPENBAND', 'access_token')).resolves.toBeUndefined();
    });
  });

  it('rejects unsafe namespaces before running any command', async () => {
    await expect(store.get('OPEN BAND;', 'access_token')).rejects.toThrow(
      /Invalid namespace: contains unsafe characters/,
    );
    expect(mockExecFileAsync).not.toHaveBeenCalled();
  });
});

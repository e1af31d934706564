import { execFile } from 'child_process';
import { promisify } from 'util';
import { promises as fs } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { logEvent } from '../logger.js';
import { ValidationUtils } from '../validation-utils.js';
import { getFilename } from './util/keychain-utils.js';
import type { ISecretStore } from './types.js';

const execFileAsync = promisify(execFile);

// Secret values reach PowerShell through the environment, never the command line
const SECRET_ENV_VAR = 'BANDKIT_SECRET_VALUE';

const LOAD_PASSWORD_VAULT = [
  '$null = [Windows.Security.Credentials.PasswordVault,Windows.Security.Credentials,ContentType=WindowsRuntime];',
  '$vault = New-Object Windows.Security.Credentials.PasswordVault;',
];

export interface KeychainSecretStoreOptions {
  /** Keychain service name; defaults to 'bandkit' */
  serviceName?: string;
  /** Directory of the file fallback; defaults to ~/.bandkit/secrets */
  fallbackDir?: string;
}

/**
 * Secret storage in the OS-native keychain/credential store
 *
 * Platform Support:
 * - macOS: `security` command for Keychain access
 * - Windows: the PasswordVault API through PowerShell, keyed by (service, account)
 * - Linux: file storage with user-only permissions
 *
 * A keychain failure on macOS or Windows falls back to the file storage too.
 * @remarks
 * All command execution uses execFile with argument arrays; namespaces and keys
 * are validated against a strict pattern before they reach a command line.
 * @example
 * ```typescript
 * const store = new KeychainSecretStore();
 * await store.set('OPENBAND', 'access_token', token);
 * const cached = await store.get('OPENBAND', 'access_token');
 * ```
 * @public
 */
export class KeychainSecretStore implements ISecretStore {
  private readonly serviceName: string;
  private readonly fallbackDir: string;

  public constructor(options: KeychainSecretStoreOptions = {}) {
    this.serviceName = options.serviceName ?? 'bandkit';
    this.fallbackDir = options.fallbackDir ?? join(homedir(), '.bandkit', 'secrets');
    ValidationUtils.sanitizeIdentifier(this.serviceName, 'serviceName');
  }

  public async set(namespace: string, key: string, value: string): Promise<void> {
    const account = this.account(namespace, key);

    try {
      await this.storeInKeychain(account, value);
      logEvent('debug', 'secrets:stored_keychain', {
        namespace,
        key,
        platform: process.platform,
      });
    } catch (error) {
      logEvent('warn', 'secrets:keychain_store_failed', {
        namespace,
        key,
        error: error instanceof Error ? error.message : String(error),
        fallbackUsed: true,
      });

      await this.storeInFile(account, value);
    }
  }

  /**
   * @returns The stored value, or null when neither the keychain nor the file fallback has it
   */
  public async get(namespace: string, key: string): Promise<string | null> {
    const account = this.account(namespace, key);

    try {
      return await this.retrieveFromKeychain(account);
    } catch (keychainError) {
      try {
        return await this.retrieveFromFile(account);
      } catch (fileError) {
        logEvent('debug', 'secrets:retrieve_failed', {
          namespace,
          key,
          keychainError:
            keychainError instanceof Error ? keychainError.message : String(keychainError),
          fileError: fileError instanceof Error ? fileError.message : String(fileError),
        });
        return null;
      }
    }
  }

  /**
   * Removes the secret from both the keychain and the file fallback.
   * @remarks
   * Does not throw if removal fails; failures are logged as debug events.
   */
  public async delete(namespace: string, key: string): Promise<void> {
    const account = this.account(namespace, key);

    try {
      await this.removeFromKeychain(account);
    } catch (error) {
      logEvent('debug', 'secrets:keychain_delete_failed', {
        namespace,
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    try {
      await this.removeFromFile(account);
    } catch (error) {
      logEvent('debug', 'secrets:file_delete_failed', {
        namespace,
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private account(namespace: string, key: string): string {
    ValidationUtils.sanitizeIdentifier(namespace, 'namespace');
    ValidationUtils.sanitizeIdentifier(key, 'key');
    return `${this.serviceName}:${namespace}:${key}`;
  }

  private async storeInKeychain(account: string, value: string): Promise<void> {
    if (process.platform === 'darwin') {
      await execFileAsync('security', [
        'add-generic-password',
        '-a',
        account,
        '-s',
        this.serviceName,
        '-w',
        value,
        '-U',
      ]);
    } else if (process.platform === 'win32') {
      await this.runPasswordVault(
        [
          `try { $vault.Remove($vault.Retrieve(${this.vaultKey(account)})) } catch { };`,
          `$vault.Add((New-Object Windows.Security.Credentials.PasswordCredential(${this.vaultKey(account)}, $env:${SECRET_ENV_VAR})));`,
        ],
        { [SECRET_ENV_VAR]: value },
      );
    } else {
      throw new Error('No keychain available for this platform');
    }
  }

  private async retrieveFromKeychain(account: string): Promise<string> {
    if (process.platform === 'darwin') {
      const { stdout } = await execFileAsync('security', [
        'find-generic-password',
        '-a',
        account,
        '-s',
        this.serviceName,
        '-w',
      ]);
      return stdout.trim();
    } else if (process.platform === 'win32') {
      const stdout = await this.runPasswordVault([
        'try {',
        `  $cred = $vault.Retrieve(${this.vaultKey(account)});`,
        '  $cred.RetrievePassword();',
        '  Write-Output $cred.Password',
        '} catch {',
        '  Write-Error "Credential not found: $_";',
        '  exit 1',
        '}',
      ]);
      return stdout.trim();
    } else {
      throw new Error('No keychain available for this platform');
    }
  }

  private async removeFromKeychain(account: string): Promise<void> {
    if (process.platform === 'darwin') {
      await execFileAsync('security', [
        'delete-generic-password',
        '-a',
        account,
        '-s',
        this.serviceName,
      ]);
    } else if (process.platform === 'win32') {
      await this.runPasswordVault([
        `$vault.Remove($vault.Retrieve(${this.vaultKey(account)}));`,
      ]);
    } else {
      throw new Error('No keychain available for this platform');
    }
  }

  // Resource and user name, in that order, for every PasswordVault call
  private vaultKey(account: string): string {
    return `"${this.serviceName}", "${account}"`;
  }

  private async runPasswordVault(
    script: string[],
    env: Record<string, string> = {},
  ): Promise<string> {
    const { stdout } = await execFileAsync(
      'powershell',
      ['-NoProfile', '-NonInteractive', '-Command', [...LOAD_PASSWORD_VAULT, ...script].join(' ')],
      { env: { ...process.env, ...env } },
    );
    return stdout;
  }

  private async storeInFile(account: string, value: string): Promise<void> {
    const filepath = join(this.fallbackDir, getFilename(account));

    await fs.mkdir(this.fallbackDir, { recursive: true, mode: 0o700 });
    await fs.writeFile(filepath, value, { mode: 0o600 });

    logEvent('debug', 'secrets:stored_file', { filepath });
  }

  private async retrieveFromFile(account: string): Promise<string> {
    const filepath = join(this.fallbackDir, getFilename(account));
    const value = await fs.readFile(filepath, 'utf8');
    return value.trim();
  }

  private async removeFromFile(account: string): Promise<void> {
    const filepath = join(this.fallbackDir, getFilename(account));

    try {
      await fs.unlink(filepath);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
  }
}

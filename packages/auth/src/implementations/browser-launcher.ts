import { execFile } from 'child_process';
import { promisify } from 'util';
import { logEvent } from '@bandkit/core';

const execFileAsync = promisify(execFile);

/**
 * Opens the authorize URL in an external user-agent.
 *
 * The coordinator does not await consent through this call; a rejected
 * promise is logged and the listener keeps waiting.
 * @public
 */
export interface IBrowserLauncher {
  open(url: string): Promise<void>;
}

/**
 * Hands the URL to the platform's default browser.
 *
 * Arguments go through `execFile`, never a shell, so the query string's `&`
 * is passed intact.
 * @public
 */
export class SystemBrowserLauncher implements IBrowserLauncher {
  public constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  public async open(url: string): Promise<void> {
    const [command, args] = this.commandFor(url);
    await execFileAsync(command, args);
    logEvent('debug', 'auth:browser_opened', { command });
  }

  private commandFor(url: string): [string, string[]] {
    switch (this.platform) {
      case 'darwin':
        return ['open', [url]];
      case 'win32':
        return ['rundll32', ['url.dll,FileProtocolHandler', url]];
      default:
        return ['xdg-open', [url]];
    }
  }
}

/**
 * Prints the URL for the user to open by hand.
 * @public
 */
export class ManualBrowserLauncher implements IBrowserLauncher {
  public async open(url: string): Promise<void> {
    console.info('\nOpen this URL in your browser to authorize:');
    console.info(url);
    console.info('\nWaiting for the authorization redirect...\n');
    logEvent('info', 'auth:authorization_required', { url });
  }
}

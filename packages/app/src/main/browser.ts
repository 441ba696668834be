/**
 * @module browser
 * Open the viewer page in the user's default browser.
 */

import { spawn } from 'child_process';
import type { Logger } from '@svgview/types';
import { describeError, silentLogger } from '@svgview/core';

/** Opener command for a platform. */
export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): {
  command: string;
  args: string[];
} {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Launch the platform opener detached from this process.
 * A missing or failing opener is only logged; the page can still be opened by hand.
 */
export function openInBrowser(
  url: string,
  logger: Logger = silentLogger,
  platform: NodeJS.Platform = process.platform,
): void {
  const { command, args } = browserCommand(url, platform);
  try {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', (error) => {
      logger.warn(`Could not open a browser (${command}): ${error.message}. Open ${url} manually.`);
    });
    child.unref();
  } catch (error) {
    logger.warn(`Could not open a browser (${command}): ${describeError(error)}. Open ${url} manually.`);
  }
}

/**
 * Cross-platform browser opener for HTML report files.
 */

import { exec } from 'child_process';
import { pathToFileURL } from 'url';

/** @internal Exported for tests. */
export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'darwin':
      return `open "${url}"`;
    case 'win32':
      return `start "" "${url}"`;
    default:
      return `xdg-open "${url}"`;
  }
}

/**
 * Open a file path in the default system browser. Launch failures are
 * passed to `onError`; the report file is already written by then.
 */
export function openInBrowser(filePath: string, onError?: (err: Error) => void): void {
  const url = pathToFileURL(filePath).href;
  exec(browserCommand(url), err => {
    if (err && onError) onError(err);
  });
}

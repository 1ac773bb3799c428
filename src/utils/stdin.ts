const STDIN_TIMEOUT_MS = 5_000;

/**
 * Check if stdin is being piped (not a TTY)
 */
export function isStdinPiped(): boolean {
  return !process.stdin.isTTY;
}

/**
 * Read a secret from a stdin pipe. Only the final line break is dropped:
 * leading and trailing spaces can be part of a passphrase.
 * Rejects on empty input or after 5 s without end of input.
 */
export function readSecretFromStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    const timeout = setTimeout(() => {
      reject(new Error('Timeout reading secret from stdin'));
    }, STDIN_TIMEOUT_MS);

    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => { data += chunk; });
    stream.on('end', () => {
      clearTimeout(timeout);
      const secret = data.replace(/\r?\n$/, '');
      if (!secret) {
        reject(new Error('No secret received from stdin'));
        return;
      }
      resolve(secret);
    });
    stream.on('error', (err) => {
      clearTimeout(timeout);
      reject(err);
    });
    stream.resume();
  });
}

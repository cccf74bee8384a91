import { createInterface } from 'readline';

export async function promptUser(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    const answer = await new Promise<string>(resolve => rl.question(question, resolve));
    return answer.trim();
  } finally {
    rl.close();
  }
}

const ENTER = new Set(['\n', '\r']);
const CTRL_C = '\u0003';
const BACKSPACE = new Set(['\u007f', '\b']);

/**
 * Read a secret without echoing it. Pasted input arrives as one chunk, so
 * each chunk is handled character by character. Falls back to a plain
 * prompt when stdin is not a terminal.
 */
export async function promptSecure(question: string): Promise<string> {
  const stdin = process.stdin;
  if (!stdin.isTTY) {
    return promptUser(question);
  }

  process.stdout.write(question);
  stdin.setRawMode(true);
  stdin.resume();

  return new Promise(resolve => {
    let secret = '';

    const finish = () => {
      stdin.removeListener('data', onData);
      stdin.setRawMode(false);
      stdin.pause();
      process.stdout.write('\n');
    };

    const onData = (chunk: Buffer) => {
      for (const char of chunk.toString('utf-8')) {
        if (ENTER.has(char)) {
          finish();
          resolve(secret.trim());
          return;
        }
        if (char === CTRL_C) {
          finish();
          process.exit(130);
        }
        if (BACKSPACE.has(char)) {
          if (secret.length > 0) {
            secret = secret.slice(0, -1);
            process.stdout.write('\b \b');
          }
        } else if (char >= ' ') {
          secret += char;
          process.stdout.write('*');
        }
      }
    };

    stdin.on('data', onData);
  });
}

export async function promptConfirm(question: string, defaultValue = false): Promise<boolean> {
  const answer = (await promptUser(`${question} (${defaultValue ? 'Y/n' : 'y/N'}): `)).toLowerCase();
  if (!answer) {
    return defaultValue;
  }
  return answer === 'y' || answer === 'yes';
}

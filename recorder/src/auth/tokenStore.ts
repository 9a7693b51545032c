import fs from 'fs';
import path from 'path';

/**
 * Where the recorder keeps the bearer token issued at login
 */
export interface TokenStore {
  load(): string | null;
  save(token: string): void;
  clear(): void;
}

/**
 * Token kept in a single file readable only by the current user
 */
export class FileTokenStore implements TokenStore {
  constructor(private filePath: string) {}

  load(): string | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }
    const token = fs.readFileSync(this.filePath, 'utf8').trim();
    return token.length > 0 ? token : null;
  }

  save(token: string): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    fs.writeFileSync(this.filePath, token, { encoding: 'utf8', mode: 0o600 });
  }

  clear(): void {
    fs.rmSync(this.filePath, { force: true });
  }
}

export class MemoryTokenStore implements TokenStore {
  private token: string | null;

  constructor(initial: string | null = null) {
    this.token = initial;
  }

  load(): string | null {
    return this.token;
  }

  save(token: string): void {
    this.token = token;
  }

  clear(): void {
    this.token = null;
  }
}

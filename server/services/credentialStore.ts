import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CredentialFileSchema, type CredentialFile } from '../lib/apiSchemas.js';
import { CredentialExpiredError, errorMessage } from '../lib/errors.js';

export interface Credential {
  accessToken: string;
  accessIssuedAtMs: number;
  refreshToken: string;
  refreshIssuedAtMs: number;
  tokenType?: string;
  scope?: string;
}

export interface CredentialStore {
  readonly location: string;
  load: () => Promise<Credential>;
  save: (credential: Credential) => Promise<void>;
}

export function credentialToFile(credential: Credential): CredentialFile {
  const file: CredentialFile = {
    accessToken: credential.accessToken,
    accessIssuedAt: new Date(credential.accessIssuedAtMs).toISOString(),
    refreshToken: credential.refreshToken,
    refreshIssuedAt: new Date(credential.refreshIssuedAtMs).toISOString(),
  };
  if (credential.tokenType) file.tokenType = credential.tokenType;
  if (credential.scope) file.scope = credential.scope;
  return file;
}

/**
 * Parse the on-disk record. Anything that does not validate is treated as an
 * unusable credential: only the external authorization flow can recreate it.
 */
export function parseCredentialFile(raw: unknown, location: string): Credential {
  const result = CredentialFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid';
    throw new CredentialExpiredError(`Credential file ${location} is invalid (${where})`);
  }
  const file = result.data;
  const accessIssuedAtMs = Date.parse(file.accessIssuedAt);
  const refreshIssuedAtMs = Date.parse(file.refreshIssuedAt);
  if (refreshIssuedAtMs > accessIssuedAtMs) {
    throw new CredentialExpiredError(
      `Credential file ${location} is inconsistent: refreshIssuedAt is later than accessIssuedAt`,
    );
  }
  return {
    accessToken: file.accessToken,
    accessIssuedAtMs,
    refreshToken: file.refreshToken,
    refreshIssuedAtMs,
    ...(file.tokenType ? { tokenType: file.tokenType } : {}),
    ...(file.scope ? { scope: file.scope } : {}),
  };
}

function isMissingFileError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * JSON file store. Writes go to a sibling temp file that is renamed over the
 * target, so a crash mid-write leaves either the old or the new record.
 */
export function createFileCredentialStore(filePath: string): CredentialStore {
  const location = path.resolve(filePath);

  async function load(): Promise<Credential> {
    let text: string;
    try {
      text = await readFile(location, 'utf8');
    } catch (err: unknown) {
      if (isMissingFileError(err)) {
        throw new CredentialExpiredError(`Credential file ${location} not found — run the authorization flow first`);
      }
      throw err;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err: unknown) {
      throw new CredentialExpiredError(`Credential file ${location} is not valid JSON (${errorMessage(err)})`);
    }
    return parseCredentialFile(raw, location);
  }

  async function save(credential: Credential): Promise<void> {
    const tmpPath = `${location}.${process.pid}.${Date.now()}.tmp`;
    await mkdir(path.dirname(location), { recursive: true });
    try {
      await writeFile(tmpPath, `${JSON.stringify(credentialToFile(credential), null, 2)}\n`, {
        encoding: 'utf8',
        mode: 0o600,
      });
      await rename(tmpPath, location);
    } catch (err: unknown) {
      await unlink(tmpPath).catch((cleanupErr: unknown) => {
        if (!isMissingFileError(cleanupErr)) {
          console.warn(`[token] Failed to remove temp credential file ${tmpPath}: ${errorMessage(cleanupErr)}`);
        }
      });
      throw err;
    }
  }

  return { location, load, save };
}

/**
 * Session store
 *
 * A session is a directory under <dataDir>/sessions holding the pre-state
 * artifacts of one propagation run plus a session.json ledger describing
 * them. Artifacts are written before the ledger entry that names them, and
 * the ledger is replaced atomically after every entry, so a crash never
 * leaves an entry pointing at a missing backup.
 */

import fs from 'fs';
import path from 'path';
import { SESSION_LEDGER_FILE, SESSION_PATCH_FILE, SESSIONS_DIR_NAME } from '../constants.js';
import { BackupError, SelectionError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ChangeSelection, PatchKind, Repository, Strategy } from './types.js';

export const LEDGER_VERSION = 1;

export interface FileBackupEntry {
  kind: 'file';
  target: string;
  targetRoot: string;
  relativePath: string;
  /** Artifact path relative to the session directory */
  artifact: string;
  recordedAt: string;
}

export interface RepositoryBackupEntry {
  kind: 'repository';
  target: string;
  targetRoot: string;
  /** HEAD before the apply */
  baseCommit: string;
  /** HEAD once the patch landed; absent when nothing was committed */
  appliedCommit?: string;
  patchKind: PatchKind;
  /** Binary diff of uncommitted changes before the apply, relative to the session directory */
  artifact: string;
  recordedAt: string;
}

export type LedgerEntry = FileBackupEntry | RepositoryBackupEntry;

export interface SessionLedger {
  version: number;
  id: string;
  createdAt: string;
  closedAt?: string;
  strategy: Strategy;
  source: string;
  selection: ChangeSelection;
  patchFile?: string;
  entries: LedgerEntry[];
}

export interface SessionMeta {
  strategy: Strategy;
  source: string;
  selection: ChangeSelection;
}

export interface SessionSummary {
  id: string;
  createdAt: string;
  closed: boolean;
  strategy: Strategy;
  source: string;
  entries: number;
  targets: string[];
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * YYYYMMDDHHmmss in local time
 */
export function formatSessionId(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function splitId(id: string): [string, number] {
  const match = id.match(/^(\d{14})(?:-(\d+))?$/);
  return match ? [match[1], match[2] ? parseInt(match[2], 10) : 0] : [id, 0];
}

/**
 * Chronological order, numeric on the collision suffix
 */
export function compareSessionIds(a: string, b: string): number {
  const [baseA, suffixA] = splitId(a);
  const [baseB, suffixB] = splitId(b);
  if (baseA !== baseB) {
    return baseA < baseB ? -1 : 1;
  }
  return suffixA - suffixB;
}

function writeFileAtomic(filePath: string, content: string | Buffer): void {
  const temp = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(temp, content);
  fs.renameSync(temp, filePath);
}

// Ledger parsing

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStrategy(value: unknown): value is Strategy {
  return value === 'file' || value === 'patch';
}

function isPatchKind(value: unknown): value is PatchKind {
  return value === 'diff' || value === 'mailbox';
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function parseSelection(value: unknown): ChangeSelection | null {
  if (!isRecord(value)) return null;
  switch (value.mode) {
    case 'working-tree':
      return value.scope === 'unstaged' || value.scope === 'staged' || value.scope === 'both'
        ? { mode: 'working-tree', scope: value.scope }
        : null;
    case 'commit':
      return typeof value.commit === 'string' ? { mode: 'commit', commit: value.commit } : null;
    case 'range':
      return typeof value.range === 'string' ? { mode: 'range', range: value.range } : null;
    case 'commits':
      return isStringList(value.commits) ? { mode: 'commits', commits: value.commits } : null;
    case 'manual':
      return isStringList(value.paths) ? { mode: 'manual', paths: value.paths } : null;
    default:
      return null;
  }
}

function parseEntry(value: unknown): LedgerEntry | null {
  if (!isRecord(value)) return null;
  const { target, targetRoot, artifact, recordedAt } = value;
  if (
    typeof target !== 'string' ||
    typeof targetRoot !== 'string' ||
    typeof artifact !== 'string' ||
    typeof recordedAt !== 'string'
  ) {
    return null;
  }
  if (value.kind === 'file' && typeof value.relativePath === 'string') {
    return { kind: 'file', target, targetRoot, relativePath: value.relativePath, artifact, recordedAt };
  }
  if (
    value.kind === 'repository' &&
    typeof value.baseCommit === 'string' &&
    (value.appliedCommit === undefined || typeof value.appliedCommit === 'string') &&
    isPatchKind(value.patchKind)
  ) {
    return {
      kind: 'repository',
      target,
      targetRoot,
      baseCommit: value.baseCommit,
      ...(value.appliedCommit !== undefined ? { appliedCommit: value.appliedCommit } : {}),
      patchKind: value.patchKind,
      artifact,
      recordedAt,
    };
  }
  return null;
}

/**
 * Validate a parsed session.json
 */
export function parseLedger(raw: unknown): SessionLedger | null {
  if (!isRecord(raw)) return null;
  const selection = parseSelection(raw.selection);
  if (
    typeof raw.version !== 'number' ||
    typeof raw.id !== 'string' ||
    typeof raw.createdAt !== 'string' ||
    !isStrategy(raw.strategy) ||
    typeof raw.source !== 'string' ||
    !selection ||
    !Array.isArray(raw.entries)
  ) {
    return null;
  }

  const entries: LedgerEntry[] = [];
  for (const item of raw.entries) {
    const entry = parseEntry(item);
    if (!entry) return null;
    entries.push(entry);
  }

  return {
    version: raw.version,
    id: raw.id,
    createdAt: raw.createdAt,
    closedAt: typeof raw.closedAt === 'string' ? raw.closedAt : undefined,
    strategy: raw.strategy,
    source: raw.source,
    selection,
    patchFile: typeof raw.patchFile === 'string' ? raw.patchFile : undefined,
    entries,
  };
}

/**
 * One open propagation session
 */
export class Session {
  readonly id: string;
  readonly dir: string;
  private state: SessionLedger;
  private closed = false;

  constructor(dir: string, ledger: SessionLedger) {
    this.id = ledger.id;
    this.dir = dir;
    this.state = ledger;
    this.writeLedger();
  }

  get ledger(): Readonly<SessionLedger> {
    return this.state;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Snapshot a target file before it is overwritten
   */
  recordFileBackup(target: Repository, relativePath: string): FileBackupEntry {
    this.assertOpen();
    const artifact = this.nextArtifact('files', '.bak');
    const live = path.join(target.root, relativePath);

    this.writeArtifact(artifact, () => fs.copyFileSync(live, path.join(this.dir, artifact)));

    const entry: FileBackupEntry = {
      kind: 'file',
      target: target.name,
      targetRoot: target.root,
      relativePath,
      artifact,
      recordedAt: new Date().toISOString(),
    };
    this.appendEntry(entry);
    return entry;
  }

  /**
   * Record a target's base commit and uncommitted pre-state before a patch apply
   */
  recordRepositoryBackup(
    target: Repository,
    baseCommit: string,
    patchKind: PatchKind,
    preState: Buffer
  ): RepositoryBackupEntry {
    this.assertOpen();
    const artifact = this.nextArtifact('repos', '.pre.patch');

    this.writeArtifact(artifact, () => fs.writeFileSync(path.join(this.dir, artifact), preState));

    const entry: RepositoryBackupEntry = {
      kind: 'repository',
      target: target.name,
      targetRoot: target.root,
      baseCommit,
      patchKind,
      artifact,
      recordedAt: new Date().toISOString(),
    };
    this.appendEntry(entry);
    return entry;
  }

  /**
   * Record the commit a patch apply produced, so revert can reverse exactly it
   */
  recordAppliedCommit(entry: RepositoryBackupEntry, appliedCommit: string): RepositoryBackupEntry {
    this.assertOpen();
    const previous = this.state;
    const updated: RepositoryBackupEntry = { ...entry, appliedCommit };
    this.state = {
      ...previous,
      entries: previous.entries.map((e) => (e.artifact === entry.artifact ? updated : e)),
    };
    try {
      this.writeLedger();
    } catch (error) {
      this.state = previous;
      throw new BackupError(`Cannot update ledger of session ${this.id}: ${errorMessage(error)}`, {
        sessionId: this.id,
      });
    }
    return updated;
  }

  /**
   * Keep the propagated patch with the session; returns its absolute path
   */
  storePatch(content: Buffer): string {
    this.assertOpen();
    const patchPath = path.join(this.dir, SESSION_PATCH_FILE);
    try {
      fs.writeFileSync(patchPath, content);
    } catch (error) {
      throw new BackupError(`Cannot store patch for session ${this.id}: ${errorMessage(error)}`, {
        sessionId: this.id,
      });
    }
    this.state = { ...this.state, patchFile: SESSION_PATCH_FILE };
    this.writeLedger();
    return patchPath;
  }

  /**
   * Seal the session. Further records are rejected.
   */
  close(): void {
    if (this.closed) return;
    this.state = { ...this.state, closedAt: new Date().toISOString() };
    this.writeLedger();
    this.closed = true;
    logger.debug(`Session ${this.id} closed with ${this.state.entries.length} backup(s)`);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new BackupError(`Session ${this.id} is closed`, { sessionId: this.id });
    }
  }

  private nextArtifact(subdir: string, extension: string): string {
    const n = this.state.entries.length + 1;
    return `${subdir}/${pad(n, 4)}${extension}`;
  }

  private writeArtifact(artifact: string, write: () => void): void {
    try {
      fs.mkdirSync(path.dirname(path.join(this.dir, artifact)), { recursive: true });
      write();
    } catch (error) {
      throw new BackupError(`Backup failed in session ${this.id}: ${errorMessage(error)}`, {
        sessionId: this.id,
      });
    }
  }

  private appendEntry(entry: LedgerEntry): void {
    this.state = { ...this.state, entries: [...this.state.entries, entry] };
    try {
      this.writeLedger();
    } catch (error) {
      this.state = { ...this.state, entries: this.state.entries.slice(0, -1) };
      fs.rmSync(path.join(this.dir, entry.artifact), { force: true });
      throw new BackupError(`Cannot update ledger of session ${this.id}: ${errorMessage(error)}`, {
        sessionId: this.id,
      });
    }
  }

  private writeLedger(): void {
    writeFileAtomic(
      path.join(this.dir, SESSION_LEDGER_FILE),
      JSON.stringify(this.state, null, 2) + '\n'
    );
  }
}

/**
 * Sessions under one data directory
 */
export class SessionStore {
  readonly sessionsDir: string;

  constructor(dataDir: string) {
    this.sessionsDir = path.join(dataDir, SESSIONS_DIR_NAME);
  }

  /**
   * Create a new session directory with an empty ledger
   */
  openSession(meta: SessionMeta, now: Date = new Date()): Session {
    const base = formatSessionId(now);
    const { id, dir } = this.reserve(base);

    logger.debug(`Opened session ${id} in ${dir}`);
    return new Session(dir, {
      version: LEDGER_VERSION,
      id,
      createdAt: now.toISOString(),
      strategy: meta.strategy,
      source: meta.source,
      selection: meta.selection,
      entries: [],
    });
  }

  private reserve(base: string): { id: string; dir: string } {
    try {
      fs.mkdirSync(this.sessionsDir, { recursive: true });
      let id = base;
      for (let n = 1; fs.existsSync(path.join(this.sessionsDir, id)); n++) {
        id = `${base}-${n}`;
      }
      const dir = path.join(this.sessionsDir, id);
      fs.mkdirSync(dir);
      return { id, dir };
    } catch (error) {
      throw new BackupError(`Cannot create session directory: ${errorMessage(error)}`, {
        sessionId: base,
      });
    }
  }

  /**
   * Session ids with a ledger, oldest first
   */
  listSessionIds(): string[] {
    if (!fs.existsSync(this.sessionsDir)) {
      return [];
    }
    return fs
      .readdirSync(this.sessionsDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .filter((entry) => fs.existsSync(path.join(this.sessionsDir, entry.name, SESSION_LEDGER_FILE)))
      .map((entry) => entry.name)
      .sort(compareSessionIds);
  }

  /**
   * Summaries of every readable session, oldest first
   */
  listSessions(): SessionSummary[] {
    const summaries: SessionSummary[] = [];
    for (const id of this.listSessionIds()) {
      let ledger: SessionLedger;
      try {
        ledger = this.loadSession(id);
      } catch (error) {
        logger.warn(`Skipping session ${id}: ${errorMessage(error)}`);
        continue;
      }
      summaries.push({
        id,
        createdAt: ledger.createdAt,
        closed: ledger.closedAt !== undefined,
        strategy: ledger.strategy,
        source: ledger.source,
        entries: ledger.entries.length,
        targets: [...new Set(ledger.entries.map((e) => e.target))],
      });
    }
    return summaries;
  }

  sessionDir(id: string): string {
    return path.join(this.sessionsDir, id);
  }

  /**
   * Read and validate a session ledger
   */
  loadSession(id: string): SessionLedger {
    if (!/^[\w-]+$/.test(id)) {
      throw new SelectionError(`Invalid session id: ${id}`, { input: id });
    }
    const ledgerPath = path.join(this.sessionDir(id), SESSION_LEDGER_FILE);
    if (!fs.existsSync(ledgerPath)) {
      throw new SelectionError(`Session not found: ${id}`, { input: id });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(ledgerPath, 'utf8'));
    } catch (error) {
      throw new SelectionError(`Unreadable ledger for session ${id}: ${errorMessage(error)}`, {
        input: id,
      });
    }
    const ledger = parseLedger(raw);
    if (!ledger) {
      throw new SelectionError(`Malformed ledger for session ${id}`, { input: id });
    }
    return ledger;
  }
}

import pino from 'pino';
import fs from 'fs';
import path from 'path';
import { PassThrough, Transform, Writable } from 'stream';
import config from '../config';

/**
 * Line format:
 * [YYYY-MM-DD HH:MM:SS] env.LEVEL: message {context}
 *
 * - stdout always, plus one file per day under LOG_DIR when it is set
 * - secrets and signing keys never reach the output
 */

function ensureDir(dirPath: string) {
  fs.mkdirSync(dirPath, { recursive: true });
}

function envLabel(nodeEnv: string): string {
  if (nodeEnv === 'development') return 'local';
  return nodeEnv || 'production';
}

function levelLabel(level: number): string {
  if (level >= 60) return 'EMERGENCY';
  if (level >= 50) return 'ERROR';
  if (level >= 40) return 'WARNING';
  if (level >= 30) return 'INFO';
  return 'DEBUG';
}

function makeDateKey(date: Date, timeZone: string): string {
  // en-CA -> YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(date);
}

function makeTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  }).formatToParts(date);

  const get = (type: string) => parts.find((p) => p.type === type)?.value || '00';
  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const SENSITIVE_KEY_RE = /(authorization|cookie|x-admin-key|admin_key|adminkey|secret|token|password)/i;

export function redactDeep(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string') {
    // payload snapshots can be large
    if (value.length > 2000) return value.slice(0, 2000) + '…';
    return value;
  }
  if (typeof value !== 'object') return value;

  if (Array.isArray(value)) return value.map(redactDeep);
  if (Buffer.isBuffer(value)) return `[Buffer ${value.byteLength}]`;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (SENSITIVE_KEY_RE.test(k)) {
      out[k] = '[REDACTED]';
      continue;
    }
    out[k] = redactDeep(v);
  }
  return out;
}

class DailyLogFileWriter extends Writable {
  private currentDateKey: string | null = null;
  private currentStream: fs.WriteStream | null = null;

  constructor(
    private readonly dir: string,
    private readonly timeZone: string
  ) {
    super();
    ensureDir(dir);
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    const dateKey = makeDateKey(new Date(), this.timeZone);
    const stream = this.currentDateKey === dateKey && this.currentStream ? this.currentStream : this.rotate(dateKey);
    stream.write(chunk, callback);
  }

  private rotate(dateKey: string): fs.WriteStream {
    this.currentDateKey = dateKey;
    this.currentStream?.end();

    const filePath = path.join(this.dir, `${dateKey}.log`);
    this.currentStream = fs.createWriteStream(filePath, { flags: 'a' });
    return this.currentStream;
  }
}

export class LineFormatTransform extends Transform {
  private buffer = '';

  constructor(
    private readonly opts: { timeZone: string; env: string }
  ) {
    super();
  }

  _transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.buffer += chunk.toString();
    let idx: number;
    while ((idx = this.buffer.indexOf('\n')) >= 0) {
      const line = this.buffer.slice(0, idx);
      this.buffer = this.buffer.slice(idx + 1);
      const formatted = this.formatLine(line);
      if (formatted) this.push(formatted);
    }
    callback();
  }

  formatLine(line: string): string | null {
    const trimmed = line.trim();
    if (!trimmed) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      // non-JSON lines pass through untouched
      return trimmed + '\n';
    }
    if (!isRecord(parsed)) {
      return trimmed + '\n';
    }

    const { level, time, pid, hostname, msg, message, v, ...rest } = parsed;

    const timeMs = typeof time === 'number' ? time : Date.now();
    const ts = makeTimestamp(new Date(timeMs), this.opts.timeZone);
    const lvl = levelLabel(Number(level) || 30);
    const text = String(msg ?? message ?? '');

    const context = redactDeep(rest);
    const hasContext = typeof context === 'object' && context !== null && Object.keys(context).length > 0;
    const ctxText = hasContext ? ' ' + JSON.stringify(context) : '';

    return `[${ts}] ${this.opts.env}.${lvl}: ${text}${ctxText}\n`;
  }
}

const formatOptions = {
  timeZone: config.server.timezone,
  env: envLabel(config.server.nodeEnv),
};

// Raw streams receiving pino JSON lines
const consoleRaw = new PassThrough();
consoleRaw.pipe(new LineFormatTransform(formatOptions)).pipe(process.stdout);

const streams: pino.StreamEntry[] = [{ level: 'trace', stream: consoleRaw }];

if (config.logging.dir) {
  const fileRaw = new PassThrough();
  fileRaw.pipe(new LineFormatTransform(formatOptions)).pipe(new DailyLogFileWriter(config.logging.dir, config.server.timezone));
  streams.push({ level: 'trace', stream: fileRaw });
}

const logger = pino(
  {
    level: config.server.logLevel,
    serializers: {
      err: pino.stdSerializers.err,
    },
  },
  pino.multistream(streams)
);

export default logger;

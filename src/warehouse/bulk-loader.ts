import * as fs from 'fs';
import { Transform, TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { PoolClient } from 'pg';
import { from as copyFrom } from 'pg-copy-streams';
import { LoadError, describeError, systemErrorCode } from '../core/errors';
import { ContainerRef, FormatSpec } from '../core/types';
import { columnList, qualified, quoteLiteral } from './sql';

export interface BulkLoadRequest {
  table: string;
  sourcePath: string;
  format: FormatSpec;
  landing: ContainerRef;
  columns: readonly string[];
}

export interface BulkLoader {
  /** Copies the source file verbatim into the landing container; resolves to rows loaded. */
  load(client: PoolClient, request: BulkLoadRequest): Promise<number>;
}

const MAX_HEADER_BYTES = 1024 * 1024;
const LINE_FEED = 0x0a;

/**
 * Drops the first `count` lines of a byte stream. Lines are split on the
 * configured terminator only; quoted line breaks in header rows are not supported.
 */
export class LeadingLineSkipper extends Transform {
  private remaining: number;
  private carry: Buffer = Buffer.alloc(0);
  private readonly terminator: Buffer;

  constructor(count: number, terminator: string) {
    super();
    this.remaining = count;
    this.terminator = Buffer.from(terminator);
  }

  _transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;

    if (this.remaining === 0) {
      callback(null, bytes);
      return;
    }

    let buffer = this.carry.length ? Buffer.concat([this.carry, bytes]) : bytes;
    while (this.remaining > 0) {
      const end = buffer.indexOf(this.terminator);
      if (end === -1) break;
      buffer = buffer.subarray(end + this.terminator.length);
      this.remaining--;
    }

    if (this.remaining > 0) {
      if (buffer.length > MAX_HEADER_BYTES) {
        callback(this.unterminatedHeader());
        return;
      }
      this.carry = buffer;
      callback();
      return;
    }

    this.carry = Buffer.alloc(0);
    callback(null, buffer.length ? buffer : undefined);
  }

  _flush(callback: TransformCallback): void {
    // An unterminated last header line is allowed; a line feed here means another terminator
    const foreignBreak = this.remaining > 0 && this.carry.includes(LINE_FEED);
    this.carry = Buffer.alloc(0);
    callback(foreignBreak ? this.unterminatedHeader() : null);
  }

  private unterminatedHeader(): Error {
    return new Error(
      `header row not terminated by the configured line terminator ${JSON.stringify(this.terminator.toString())}`
    );
  }
}

export function buildCopyStatement(
  landing: ContainerRef,
  columns: readonly string[],
  format: FormatSpec
): string {
  return (
    `COPY ${qualified(landing)} (${columnList(columns)}) FROM STDIN ` +
    `WITH (FORMAT csv, DELIMITER ${quoteLiteral(format.delimiter)}, QUOTE ${quoteLiteral(format.quoteChar)}, NULL '')`
  );
}

async function assertReadableFile(request: BulkLoadRequest): Promise<void> {
  try {
    await fs.promises.access(request.sourcePath, fs.constants.R_OK);
    const stats = await fs.promises.stat(request.sourcePath);
    if (!stats.isFile()) {
      throw new LoadError('SOURCE_UNREADABLE', request.table, request.sourcePath, 'not a regular file');
    }
  } catch (error) {
    if (error instanceof LoadError) throw error;
    const code = systemErrorCode(error);
    throw new LoadError(
      code === 'ENOENT' ? 'SOURCE_NOT_FOUND' : 'SOURCE_UNREADABLE',
      request.table,
      request.sourcePath,
      describeError(error),
      { cause: error }
    );
  }
}

/**
 * Streams the file through `COPY ... FROM STDIN`. Header rows are skipped
 * client-side so any `headerRowsToSkip` works; CSV parsing is the server's.
 */
export class PgCopyBulkLoader implements BulkLoader {
  public async load(client: PoolClient, request: BulkLoadRequest): Promise<number> {
    await assertReadableFile(request);

    const copyStream = client.query(
      copyFrom(buildCopyStatement(request.landing, request.columns, request.format))
    );

    try {
      await pipeline(
        fs.createReadStream(request.sourcePath),
        new LeadingLineSkipper(request.format.headerRowsToSkip, request.format.lineTerminator),
        copyStream
      );
    } catch (error) {
      throw new LoadError('LOAD_FAILED', request.table, request.sourcePath, describeError(error), {
        cause: error
      });
    }

    return copyStream.rowCount;
  }
}

/**
 * Bulk operations
 *
 * Bulk delete and archive upload perform many item operations in one
 * request. The server answers with a report that counts successes and lists
 * failed items; partial success is reported as a {@link BulkError} that
 * still carries the counts.
 *
 * @module bulk
 */

import { z } from 'zod';
import type { Account } from '../account/index.js';
import type { Container } from '../container/index.js';
import type { SwiftObject } from '../object/index.js';
import { prepareContent, toRequestBody, type UploadContent } from '../object/index.js';
import { cloneRequestOptions, encodePath, executeRequest, type RequestOptions } from '../request/index.js';
import { readBodyText } from '../transport/index.js';
import {
  BulkError,
  SwiftError,
  isSwiftError,
  parseStatusLine,
  type BulkObjectError,
} from '../errors/index.js';

/**
 * Swift's default `max_deletes_per_request`.
 */
export const BULK_DELETE_BATCH_SIZE = 10000;

/**
 * Archive formats accepted by bulk upload.
 */
export type ArchiveFormat = 'tar' | 'tar.gz' | 'tar.bz2';

/**
 * Counts reported by a successful bulk delete.
 */
export interface BulkDeleteResult {
  numberDeleted: number;
  numberNotFound: number;
}

const bulkReportSchema = z.object({
  'Number Deleted': z.number().int().optional(),
  'Number Not Found': z.number().int().optional(),
  'Number Files Created': z.number().int().optional(),
  'Response Status': z.string(),
  'Response Body': z.string().default(''),
  Errors: z.array(z.tuple([z.string(), z.string()])).default([]),
});

/**
 * Parsed bulk operation report.
 */
export interface BulkReport {
  numberDeleted: number;
  numberNotFound: number;
  numberFilesCreated: number;
  status: string;
  body: string;
  errors: BulkObjectError[];
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // malformed escapes are reported verbatim
    return segment;
  }
}

/**
 * Splits a reported path such as `/container/dir/object` into its parts.
 */
export function parseBulkErrorPath(path: string): { containerName: string; objectName: string } {
  const trimmed = path.startsWith('/') ? path.slice(1) : path;
  const slash = trimmed.indexOf('/');
  if (slash < 0) {
    return { containerName: decodeSegment(trimmed), objectName: '' };
  }
  return {
    containerName: decodeSegment(trimmed.slice(0, slash)),
    objectName: trimmed.slice(slash + 1).split('/').map(decodeSegment).join('/'),
  };
}

/**
 * Parses the JSON report of a bulk request.
 */
export function parseBulkReport(text: string): BulkReport {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new SwiftError('bulk response is not valid JSON', 'Bulk.MalformedReport', { cause: error });
  }
  const result = bulkReportSchema.safeParse(document);
  if (!result.success) {
    throw new SwiftError(
      `malformed bulk response: ${result.error.issues.map((i) => i.message).join(', ')}`,
      'Bulk.MalformedReport'
    );
  }
  const report = result.data;
  return {
    numberDeleted: report['Number Deleted'] ?? 0,
    numberNotFound: report['Number Not Found'] ?? 0,
    numberFilesCreated: report['Number Files Created'] ?? 0,
    status: report['Response Status'],
    body: report['Response Body'],
    errors: report.Errors.map(([path, status]) => ({
      ...parseBulkErrorPath(path),
      statusCode: parseStatusLine(status),
      status,
    })),
  };
}

function batchFailureStatus(error: unknown): string {
  const code = isSwiftError(error) ? error.statusCode : undefined;
  return code === undefined ? 'Request Failed' : String(code);
}

function isSuccess(status: string): boolean {
  const code = parseStatusLine(status);
  return code >= 200 && code < 300;
}

/**
 * Deletes objects and containers in as few requests as possible.
 *
 * Objects are listed before containers, so a container emptied by the same
 * call can be deleted. Deleted containers count towards `numberDeleted`.
 *
 * @throws {BulkError} if any item failed; the error carries the counts. A
 * request failing after earlier batches went through is also reported as a
 * {@link BulkError}, with the counts so far and the failure as its cause.
 */
export async function bulkDelete(
  account: Account,
  objects: readonly SwiftObject[],
  containers: readonly Container[] = [],
  options?: RequestOptions
): Promise<BulkDeleteResult> {
  const lines: string[] = [];
  for (const object of objects) {
    assertSameAccount(account, object.container.account, object.fullName());
    lines.push(`/${encodePath(object.container.name)}/${encodePath(object.name)}`);
  }
  for (const container of containers) {
    assertSameAccount(account, container.account, container.name);
    lines.push(`/${encodePath(container.name)}`);
  }

  const result: BulkDeleteResult = { numberDeleted: 0, numberNotFound: 0 };
  const errors: BulkObjectError[] = [];
  let failedStatus: string | null = null;
  let failedBody = '';

  for (let start = 0; start < lines.length; start += BULK_DELETE_BATCH_SIZE) {
    const batch = lines.slice(start, start + BULK_DELETE_BATCH_SIZE);
    const opts = cloneRequestOptions(options);
    opts.values['bulk-delete'] = 'true';
    opts.headers.set('Content-Type', 'text/plain');
    opts.headers.set('Accept', 'application/json');

    let report: BulkReport;
    try {
      const response = await executeRequest(account.backend, {
        method: 'POST',
        options: opts,
        body: Buffer.from(`${batch.join('\n')}\n`, 'utf8'),
        expectStatusCodes: [200],
      });
      report = parseBulkReport(await readBodyText(response.body));
    } catch (error) {
      if (start === 0) {
        throw error;
      }
      throw new BulkError({
        overallStatus: batchFailureStatus(error),
        overallError: error instanceof Error ? error.message : String(error),
        objectErrors: errors,
        numberDeleted: result.numberDeleted,
        numberNotFound: result.numberNotFound,
        cause: error,
      });
    }

    result.numberDeleted += report.numberDeleted;
    result.numberNotFound += report.numberNotFound;
    errors.push(...report.errors);
    if (failedStatus === null && (!isSuccess(report.status) || report.errors.length > 0)) {
      failedStatus = report.status;
      failedBody = report.body;
    }
  }

  if (failedStatus !== null) {
    throw new BulkError({
      overallStatus: failedStatus,
      overallError: failedBody,
      objectErrors: errors,
      numberDeleted: result.numberDeleted,
      numberNotFound: result.numberNotFound,
    });
  }
  return result;
}

/**
 * Uploads an archive that the server extracts below `uploadPath`.
 *
 * With an empty `uploadPath`, the first path component of every archive
 * entry names the container. Files that were stored stay stored even if
 * other entries fail.
 *
 * @returns the number of files created
 * @throws {BulkError} if the archive or any entry was rejected
 */
export async function bulkUpload(
  account: Account,
  uploadPath: string,
  format: ArchiveFormat,
  content: UploadContent,
  options?: RequestOptions
): Promise<number> {
  const opts = cloneRequestOptions(options);
  opts.values['extract-archive'] = format;
  opts.headers.set('Accept', 'application/json');

  const prepared = prepareContent(content);
  if (prepared.kind === 'buffered' && !opts.headers.has('Content-Length')) {
    opts.headers.set('Content-Length', String(prepared.bytes.length));
  }

  const path = uploadPath.replace(/^\/+|\/+$/g, '');
  const slash = path.indexOf('/');
  const response = await executeRequest(account.backend, {
    method: 'PUT',
    containerName: slash < 0 ? path : path.slice(0, slash),
    objectName: slash < 0 ? undefined : path.slice(slash + 1),
    options: opts,
    body: toRequestBody(prepared),
    expectStatusCodes: [200],
  });
  const report = parseBulkReport(await readBodyText(response.body));

  if (!isSuccess(report.status) || report.errors.length > 0) {
    throw new BulkError({
      overallStatus: report.status,
      overallError: report.body,
      objectErrors: report.errors,
      numberFilesCreated: report.numberFilesCreated,
    });
  }
  return report.numberFilesCreated;
}

function assertSameAccount(account: Account, owner: Account, item: string): void {
  if (owner.name !== account.name) {
    throw new SwiftError(
      `${item} belongs to account ${owner.name}, not ${account.name}`,
      'Bulk.AccountMismatch'
    );
  }
}


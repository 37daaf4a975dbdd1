/**
 * AnswerExtractors
 *
 * Pull direct answers out of diagnostic command output.
 *
 * Input format: PowerShell `Format-List` output, i.e. `Key : Value` lines
 * with records separated by blank lines. Keys are compared after
 * lowercasing and dropping everything but letters and digits, so
 * `OsBuildNumber : 22631` and ipconfig's
 * `IPv4 Address. . . . . : 192.168.1.20(Preferred)` both resolve
 * (`osbuildnumber`, `ipv4address`). Only the first colon separates key
 * from value; IPv6 values keep their colons.
 */

import type { CommandResult } from '../core/types.js';

export type ListRecord = Record<string, string>;

export const IP_NOT_FOUND = 'IP address not found in diagnostics. Ask for the local IP or enable an external lookup.';

export function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Split a `Key : Value` line. Returns undefined for lines without a colon
 * or with an empty key.
 */
export function splitKeyValue(line: string): [string, string] | undefined {
  const colon = line.indexOf(':');
  if (colon <= 0) {
    return undefined;
  }
  const key = normalizeKey(line.slice(0, colon));
  if (!key) {
    return undefined;
  }
  return [key, line.slice(colon + 1).trim()];
}

/**
 * Every non-empty value for a key, in output order
 */
export function readValues(output: string, key: string): string[] {
  const wanted = normalizeKey(key);
  const values: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const pair = splitKeyValue(line);
    if (pair && pair[0] === wanted && pair[1]) {
      values.push(pair[1]);
    }
  }
  return values;
}

/**
 * First non-empty value for a key, or ''
 */
export function readValue(output: string, key: string): string {
  return readValues(output, key)[0] ?? '';
}

/**
 * Group `Key : Value` lines into records. A blank line closes a record;
 * a repeated key also starts a new one.
 */
export function parseListBlocks(output: string): ListRecord[] {
  const records: ListRecord[] = [];
  let current: ListRecord = {};

  const flush = (): void => {
    if (Object.keys(current).length > 0) {
      records.push(current);
    }
    current = {};
  };

  for (const line of output.split(/\r?\n/)) {
    if (line.trim() === '') {
      flush();
      continue;
    }
    const pair = splitKeyValue(line);
    if (!pair) {
      continue;
    }
    const [key, value] = pair;
    if (key in current) {
      flush();
    }
    current[key] = value;
  }
  flush();
  return records;
}

/**
 * Join command outputs so each command's records stay separate
 */
export function combinedOutput(results: readonly CommandResult[]): string {
  return results
    .map(result => result.output)
    .filter(output => output !== '')
    .join('\n\n');
}

const DOTTED_VERSION = /\b\d+\.\d+\.\d+(?:\.\d+)?\b/;

export function extractOsBuild(output: string): string {
  const build = readValue(output, 'OsBuildNumber') || readValue(output, 'BuildNumber');
  if (build) {
    return build;
  }
  const version = readValue(output, 'OsVersion');
  if (version) {
    return version;
  }
  for (const line of output.split(/\r?\n/)) {
    if (/\bip/i.test(line)) {
      continue;
    }
    const match = DOTTED_VERSION.exec(line);
    if (match) {
      return match[0];
    }
  }
  return '';
}

export function extractOsVersion(output: string): string {
  return readValue(output, 'OsVersion') || readValue(output, 'Version');
}

function isUsableAddress(address: string): boolean {
  return address !== '' && !address.startsWith('127.') && !address.startsWith('169.254.') && address !== '::1';
}

/**
 * IPv4 addresses from `Get-NetIPAddress` (IPAddress) or ipconfig
 * (IPv4 Address), loopback and link-local excluded. '' when none.
 */
export function extractIpAddress(output: string): string {
  const candidates = [
    ...readValues(output, 'IPAddress'),
    ...readValues(output, 'IPv4 Address')
  ].map(value => value.replace(/\(.*\)$/, '').trim());

  const unique = [...new Set(candidates.filter(isUsableAddress))];
  return unique.join(', ');
}

/**
 * Processor name: the Name of the record that also carries core or clock
 * fields, else the first Name line
 */
export function extractCpuName(output: string): string {
  const processor = parseListBlocks(output).find(
    record => record.name && ('numberofcores' in record || 'maxclockspeed' in record)
  );
  if (processor) {
    return processor.name;
  }
  return readValue(output, 'Name');
}

function kilobytesToGb(value: string): string | undefined {
  if (!/^\d+$/.test(value)) {
    return undefined;
  }
  return `${(Number(value) / 1024 / 1024).toFixed(1)} GB`;
}

function bytesToGb(value: number): string {
  return `${(value / 1024 / 1024 / 1024).toFixed(1)} GB`;
}

export interface MemoryTotals {
  total?: string;
  free?: string;
}

/**
 * Memory from Win32_OperatingSystem (values in kilobytes)
 */
export function extractMemory(output: string): MemoryTotals {
  return {
    total: kilobytesToGb(readValue(output, 'TotalVisibleMemorySize')),
    free: kilobytesToGb(readValue(output, 'FreePhysicalMemory'))
  };
}

/**
 * One line per `Get-PSDrive` record with numeric Used and Free (bytes)
 */
export function extractDiskUsage(output: string): string[] {
  return parseListBlocks(output)
    .filter(record => record.name && /^\d+$/.test(record.used ?? '') && /^\d+$/.test(record.free ?? ''))
    .map(record => `Disk ${record.name}: Used ${bytesToGb(Number(record.used))}, Free ${bytesToGb(Number(record.free))}`);
}

/**
 * Composite system view as [label, value] rows
 */
export function extractSystemDetails(output: string): Array<[string, string]> {
  const rows: Array<[string, string]> = [];
  const add = (label: string, value: string | undefined): void => {
    if (value) {
      rows.push([label, value]);
    }
  };

  add('OS', readValue(output, 'OsName'));
  add('OS Version', readValue(output, 'OsVersion'));
  add('OS Build', readValue(output, 'OsBuildNumber'));
  add('CPU', extractCpuName(output));
  const memory = extractMemory(output);
  add('RAM Total', memory.total);
  add('RAM Free', memory.free);
  add('IP', extractIpAddress(output));
  for (const disk of extractDiskUsage(output)) {
    const colon = disk.indexOf(':');
    add(disk.slice(0, colon), disk.slice(colon + 1).trim());
  }
  return rows;
}

export function formatKeyValueTable(rows: ReadonlyArray<readonly [string, string]>): string {
  const lines = ['| Item | Value |', '| --- | --- |'];
  for (const [key, value] of rows) {
    lines.push(`| ${key} | ${value.replace(/\|/g, '\\|')} |`);
  }
  return lines.join('\n');
}

const has = (question: string, pattern: RegExp): boolean => pattern.test(question);

const OS_BUILD_QUESTION = /\b(os build|build version|build number)\b/;
const IP_QUESTION = /\b(ip address|my ip)\b/;
const OS_VERSION_QUESTION = /\b(os|windows) version\b/;
const CPU_QUESTION = /\b(cpu|processor)\b/;
const MEMORY_QUESTION = /\b(ram|memory)\b/;
const FREE_QUESTION = /\b(free|available|left|unused)\b/;
const DISK_QUESTION = /\b(disk|drive|storage|free space)\b/;
const DETAILS_QUESTION = /\b(system info|system information|system infromation|computer info|about my (system|computer|pc))\b/;
const DETAIL_WORD = /\bdetails?\b/;
const MACHINE_WORD = /\b(computer|copmuter|pc|system|machine)\b/;

function isDetailsQuestion(question: string): boolean {
  return has(question, DETAILS_QUESTION) || (has(question, DETAIL_WORD) && has(question, MACHINE_WORD));
}

/**
 * Whether a question asks for a value diagnostics can answer
 */
export function isSystemInfoQuestion(question: string): boolean {
  const normalized = question.toLowerCase();
  return (
    (has(normalized, /\b(os|windows)\b/) && has(normalized, /\b(build|version)\b/)) ||
    has(normalized, IP_QUESTION) ||
    has(normalized, CPU_QUESTION) ||
    has(normalized, MEMORY_QUESTION) ||
    has(normalized, DISK_QUESTION) ||
    isDetailsQuestion(normalized)
  );
}

/**
 * Run the extractors that match the question against the output.
 * Returns '' when no extractor applies or none finds a value.
 */
export function answerFromDiagnostics(question: string, output: string): string {
  const normalized = question.toLowerCase();

  if (has(normalized, OS_BUILD_QUESTION)) {
    const build = extractOsBuild(output);
    if (build) {
      return build;
    }
  }

  if (has(normalized, IP_QUESTION)) {
    return extractIpAddress(output) || IP_NOT_FOUND;
  }

  if (has(normalized, OS_VERSION_QUESTION)) {
    const version = extractOsVersion(output);
    if (version) {
      return version;
    }
  }

  if (has(normalized, CPU_QUESTION)) {
    const cpu = extractCpuName(output);
    if (cpu) {
      return cpu;
    }
  }

  if (has(normalized, MEMORY_QUESTION)) {
    const memory = extractMemory(output);
    const value = has(normalized, FREE_QUESTION) ? memory.free ?? memory.total : memory.total ?? memory.free;
    if (value) {
      return value;
    }
  }

  if (has(normalized, DISK_QUESTION) && !isDetailsQuestion(normalized)) {
    const disks = extractDiskUsage(output);
    if (disks.length > 0) {
      return disks.join('\n');
    }
  }

  if (isDetailsQuestion(normalized)) {
    const rows = extractSystemDetails(output);
    if (rows.length > 0) {
      return formatKeyValueTable(rows);
    }
  }

  return '';
}

/**
 * Turn a knowledge-base response into a bullet list of steps.
 * Sentences end at `.` or `;` followed by whitespace or end of text.
 */
export function formatKnowledgeSteps(id: string, response: string): string {
  const steps = response
    .split(/[.;](?=\s|$)/)
    .map(step => step.trim())
    .filter(step => step !== '');
  if (steps.length === 0) {
    return id ? `Recommended steps (from ${id}): ${response.trim()}` : `Recommended steps: ${response.trim()}`;
  }
  const header = id ? `Recommended steps (from ${id}):` : 'Recommended steps:';
  return [header, ...steps.map(step => `- ${step}`)].join('\n');
}

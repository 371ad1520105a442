import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export const STATEMENT_CSV = [
    'Account Number: 0001',
    'Date,Narration,Withdrawal,Deposit,Balance',
    '01/01/24,Coffee,4.50,,95.50',
    '02/01/24,Salary,,1000.00,1095.50',
    '',
].join('\n');

/**
 * Fresh directory under the OS temp dir; remove it with removeTempDir.
 */
export async function createTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'statement-chunker-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

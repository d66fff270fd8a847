import { Response } from 'express';

export function isDuplicateKeyError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const code = 'code' in err ? err.code : undefined;
  const codeName = 'codeName' in err ? err.codeName : undefined;
  return code === 11000 || code === 'E11000' || codeName === 'DuplicateKey';
}

// Concurrent writers touching the same document inside transactions: MongoDB aborts one of them
export function isWriteConflictError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const code = 'code' in err ? err.code : undefined;
  const codeName = 'codeName' in err ? err.codeName : undefined;
  return code === 112 || codeName === 'WriteConflict';
}

export function handleSaveError(err: unknown, res?: Response): boolean {
  if (!isDuplicateKeyError(err)) return false;
  if (res) {
    const keyValue = (err && typeof err === 'object' && 'keyValue' in err) ? err.keyValue : {};
    res.status(409).json({ message: 'Duplicate key error', keyValue });
  }
  return true;
}

export default handleSaveError;

/**
 * Path utilities for corpus operations.
 * Corpus ids are always POSIX paths relative to the corpus root.
 */

import path from 'node:path';

export type RelPath = string;
export type AbsPath = string;

export const toAbs = (root: AbsPath, inputPath: string): AbsPath => {
  if (path.isAbsolute(inputPath)) {
    return inputPath;
  }
  return path.join(root, ...inputPath.split('/'));
};

export const toRel = (root: AbsPath, inputPath: string): RelPath => {
  if (!path.isAbsolute(inputPath)) {
    return toPosix(inputPath);
  }
  return toPosix(path.relative(root, inputPath));
};

export const toPosix = (p: string): string => p.split(path.sep).join('/');

/** Directory part of a corpus id; '' for files at the root */
export const dirOf = (id: RelPath): RelPath => {
  const dir = path.posix.dirname(id);
  return dir === '.' ? '' : dir;
};

/**
 * Join a corpus directory and a relative reference, normalizing `.` and `..`.
 * The result starts with `../` when the reference climbs out of the root.
 */
export const joinRel = (dir: RelPath, ref: string): RelPath => {
  const joined = path.posix.normalize(path.posix.join(dir || '.', ref));
  if (joined === '.' || joined === './') return '';
  return joined.replace(/^\.\//, '').replace(/\/$/, '');
};

/** Relative reference from one corpus directory to a corpus path */
export const relativeRef = (fromDir: RelPath, to: RelPath): string => {
  const rel = path.posix.relative(fromDir || '.', to || '.');
  return rel === '' ? '.' : rel;
};

/** Every ancestor directory of a corpus id, nearest first, ending with '' (the root) */
export const ancestorsOf = (id: RelPath): RelPath[] => {
  const out: RelPath[] = [];
  let dir = dirOf(id);
  while (dir !== '') {
    out.push(dir);
    dir = dirOf(dir);
  }
  out.push('');
  return out;
};

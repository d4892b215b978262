import path from 'path';

const DATA_ROOT = process.env.DATA_ROOT ??
  path.join(process.cwd(), 'data');

export const appPaths = {
  root: DATA_ROOT,
  logsDir: path.join(DATA_ROOT, 'logs')
};

export const DEFAULT_IGNORES = [
  '.git',
  'node_modules',
  '__pycache__',
  '.venv',
  'dist',
  'build',
  '.pytest_cache',
  '.patchloop',
];

export const IGNORE_FILES = ['.gitignore', '.patchloopignore'];

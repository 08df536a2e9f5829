import { extname } from 'node:path';

// Fence tags for Markdown code blocks. An empty tag means an untagged fence.
const LANGUAGE_BY_EXTENSION: Readonly<Record<string, string>> = {
  py: 'python',
  js: 'javascript',
  mjs: 'javascript',
  cjs: 'javascript',
  ts: 'typescript',
  mts: 'typescript',
  cts: 'typescript',
  tsx: 'tsx',
  jsx: 'jsx',
  json: 'json',
  yml: 'yaml',
  yaml: 'yaml',
  toml: 'toml',
  ini: 'ini',
  cfg: 'ini',
  md: 'markdown',
  txt: '',
  sh: 'bash',
  zsh: 'bash',
  ps1: 'powershell',
  rb: 'ruby',
  go: 'go',
  rs: 'rust',
  java: 'java',
  kt: 'kotlin',
  c: 'c',
  h: 'c',
  cpp: 'cpp',
  hpp: 'cpp',
  cs: 'csharp',
  php: 'php',
  sql: 'sql',
  html: 'html',
  css: 'css',
  vue: 'vue',
  sv: 'verilog',
};

export function getLanguage(path: string): string {
  const ext = extname(path).toLowerCase().replace(/^\./, '');
  if (!ext || !Object.prototype.hasOwnProperty.call(LANGUAGE_BY_EXTENSION, ext)) {
    return '';
  }
  return LANGUAGE_BY_EXTENSION[ext] ?? '';
}

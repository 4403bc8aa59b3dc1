export type LanguageKey =
  | 'plaintext'
  | 'css'
  | 'javascript'
  | 'typescript'
  | 'json'
  | 'php'
  | 'python'
  | 'sql'
  | 'html';

export const LANGUAGE_OPTIONS: Array<{ value: LanguageKey; label: string }> = [
  { value: 'plaintext', label: 'Plain Text' },
  { value: 'css', label: 'CSS' },
  { value: 'javascript', label: 'JavaScript' },
  { value: 'typescript', label: 'TypeScript' },
  { value: 'json', label: 'JSON' },
  { value: 'php', label: 'PHP / Laravel (Blade)' },
  { value: 'python', label: 'Python' },
  { value: 'sql', label: 'SQL' },
  { value: 'html', label: 'HTML' },
];

export const MIN_AUTO_DETECT_LENGTH = 20;

const languageLabelByValue = new Map(LANGUAGE_OPTIONS.map((item) => [item.value, item.label]));

export function isLanguageKey(value: string): value is LanguageKey {
  return LANGUAGE_OPTIONS.some((item) => item.value === value);
}

export function getLanguageLabel(value: LanguageKey) {
  return languageLabelByValue.get(value) ?? 'Plain Text';
}

function includesAny(text: string, markers: readonly string[]) {
  return markers.some((marker) => text.includes(marker));
}

const SCRIPT_MARKERS = [
  'export default',
  'export function',
  'export const',
  'require(',
  'module.exports',
  'useRef',
  'useState',
  'useEffect',
  'useCallback',
  'className=',
  'React.',
];

const TYPED_SCRIPT_MARKERS = [': string', ': number', ': boolean', 'interface ', '<T>'];

const SERVER_TEMPLATE_MARKERS = ['<?=', 'namespace App\\', 'use Illuminate\\', '$this->'];

const QUERY_PREFIXES = ['SELECT ', 'INSERT ', 'UPDATE ', 'DELETE '];

function isScript(text: string) {
  return (
    (text.includes('import ') && text.includes('from ')) ||
    (text.includes('const ') && text.includes('=>')) ||
    includesAny(text, SCRIPT_MARKERS)
  );
}

function isServerTemplate(text: string) {
  return (
    text.startsWith('<?php') ||
    includesAny(text, SERVER_TEMPLATE_MARKERS) ||
    (text.includes('@extends') && text.includes("('")) ||
    (text.includes('@section') && text.includes("('")) ||
    (text.includes('{{') && text.includes('}}'))
  );
}

function isMarkup(text: string) {
  return (
    text.includes('<!DOCTYPE') ||
    (text.startsWith('<') && text.includes('</') && !text.includes('=>'))
  );
}

function isStructuredData(text: string) {
  return (text.startsWith('{') && text.endsWith('}')) || (text.startsWith('[') && text.endsWith(']'));
}

function isStylesheet(text: string) {
  return text.includes('{') && text.includes(':') && text.includes(';');
}

function isQuery(text: string) {
  const upper = text.toUpperCase();
  return QUERY_PREFIXES.some((prefix) => upper.startsWith(prefix)) || upper.includes('CREATE TABLE');
}

function isIndentationScoped(text: string) {
  return (
    (text.includes('def ') && text.includes(':')) ||
    (text.includes('import ') && !text.includes("from '")) ||
    (text.startsWith('class ') && text.includes(':'))
  );
}

// Checked in order; earlier entries win when several match.
const DETECTION_RULES: Array<[LanguageKey, (text: string) => boolean]> = [
  ['javascript', isScript],
  ['typescript', (text) => includesAny(text, TYPED_SCRIPT_MARKERS)],
  ['php', isServerTemplate],
  ['html', isMarkup],
  ['json', isStructuredData],
  ['css', isStylesheet],
  ['sql', isQuery],
  ['python', isIndentationScoped],
];

export function detectLanguage(code: string): LanguageKey {
  const trimmed = (code || '').trim();
  if (!trimmed) {
    return 'plaintext';
  }

  const rule = DETECTION_RULES.find(([, matches]) => matches(trimmed));
  return rule ? rule[0] : 'plaintext';
}

export function shouldAutoDetectLanguage(code: string) {
  return code.length > MIN_AUTO_DETECT_LENGTH;
}

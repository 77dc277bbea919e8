// Bundle IDs and display names that name the same application. Keys are the
// canonical identity; aliases are matched case-insensitively.
const appAliases: Record<string, readonly string[]> = {
  vscode: ['com.microsoft.vscode', 'visual studio code', 'code'],
  vscodium: ['com.vscodium', 'vscodium', 'codium'],
  cursor: ['com.todesktop.230313mzl4w4u92', 'cursor'],
  xcode: ['com.apple.dt.xcode', 'xcode'],
  terminal: ['com.apple.terminal', 'terminal'],
  iterm: ['com.googlecode.iterm2', 'iterm2', 'iterm'],
  warp: ['dev.warp.warp-stable', 'warp'],
  safari: ['com.apple.safari', 'safari'],
  chrome: ['com.google.chrome', 'google chrome', 'chrome'],
  firefox: ['org.mozilla.firefox', 'firefox'],
  finder: ['com.apple.finder', 'finder'],
  slack: ['com.tinyspeck.slackmacgap', 'slack'],
  notes: ['com.apple.notes', 'notes'],
};

const aliasLookup = new Map<string, string>(
  Object.entries(appAliases).flatMap(([canonical, aliases]) =>
    [canonical, ...aliases].map(alias => [alias, canonical] as const),
  ),
);

/**
 * Resolve a bundle ID or display name to one identity per application.
 * Unknown names resolve to their trimmed lowercase form.
 */
export function canonicalAppIdentity(name: string): string {
  const key = name.trim().toLowerCase();
  return aliasLookup.get(key) ?? key;
}

export function sameApp(a: string, b: string): boolean {
  return canonicalAppIdentity(a) === canonicalAppIdentity(b);
}

const terminalKeywords = ['terminal', 'iterm', 'warp', 'alacritty', 'wezterm', 'hyper', 'kitty'];

const codeEditorKeywords = [
  'xcode', 'vscode', 'vscodium', 'cursor', 'zed', 'sublime', 'nova',
  'jetbrains', 'intellij', 'pycharm', 'goland', 'clion', 'rider', 'webstorm',
];

function matchesAny(values: readonly string[], keywords: readonly string[]): boolean {
  return values.some(value => value !== '' && keywords.some(k => value.includes(k)));
}

/** True when any of the app names resolves to a terminal emulator. */
export function isTerminalApp(...names: readonly string[]): boolean {
  return matchesAny(names.map(canonicalAppIdentity), terminalKeywords);
}

/** True when any of the app names resolves to a code editor or IDE. */
export function isCodeEditorApp(...names: readonly string[]): boolean {
  return matchesAny(names.map(canonicalAppIdentity), codeEditorKeywords);
}

/**
 * Derive the repository identifier for a module path: host labels are
 * reversed, the remaining segments appended, and everything that is not
 * alphanumeric becomes `_`.
 *
 * @example
 * repoNameForModulePath('github.com/stretchr/testify') // => 'com_github_stretchr_testify'
 * repoNameForModulePath('golang.org/x/sys')             // => 'org_golang_x_sys'
 */
export function repoNameForModulePath(modulePath: string): string {
  const [host = '', ...rest] = modulePath.split('/');
  const segments = [...host.split('.').reverse(), ...rest];
  const candidate = segments.join('_').replace(/-/g, '_');
  return Array.from(candidate, c => (/^[a-zA-Z0-9]$/.test(c) ? c.toLowerCase() : '_')).join('');
}

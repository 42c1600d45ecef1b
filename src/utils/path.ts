/**
 * Last slash-separated element of a name, as a POSIX base name: trailing
 * slashes are dropped, an empty name is "." and a name of only slashes is "/".
 * Subtest names ("TestFoo/case_1") reduce to their innermost part.
 */
export function baseName(name: string): string {
  if (name === '') return '.';

  const trimmed = name.replace(/\/+$/, '');
  if (trimmed === '') return '/';

  const slash = trimmed.lastIndexOf('/');
  return slash === -1 ? trimmed : trimmed.slice(slash + 1);
}

/** Matches the import probe for any of `modules`. */
export function importFails(...modules: string[]) {
  return (argv: string[]) =>
    argv[1] === '-c' && modules.includes(argv[3] ?? '')
}

/** Value of a `--name=value` argument: everything after the first "=" */
export function optionValue(arg: string): string {
  const eq = arg.indexOf("=");
  return eq === -1 ? "" : arg.slice(eq + 1);
}

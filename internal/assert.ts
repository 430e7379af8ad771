/** Throws an `Error` whose message joins `args` if `fact` is false. */
export function check(fact: boolean, ...args: unknown[]): asserts fact {
  if (!fact) {
    args.unshift('2-4 tree'); // at beginning of message
    throw new Error(args.join(' '));
  }
}

// Characters that never need quoting in a POSIX shell word
const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote one argument for a POSIX shell. Single quotes keep everything literal;
 * embedded single quotes are closed, escaped and reopened.
 */
export const quote = (arg: string): string => {
    if (arg === '') return "''";
    if (SAFE_WORD.test(arg)) return arg;
    return `'${arg.replace(/'/g, `'\\''`)}'`;
};

export const join = (argv: readonly string[]): string => argv.map(quote).join(' ');

/**
 * Reduce a file name to characters that survive any shell or scp path parsing.
 */
export const safeName = (name: string): string => {
    return name
        .replace(/[^A-Za-z0-9_.-]/g, '_')
        .replace(/_+/g, '_');
};

/** Sample inputs used by `--example` to try the generator without files. */
export const EXAMPLE_KEYWORDS = ["gaming keyboard", "wireless mouse", "laptop stand"];

export const EXAMPLE_SKUS = ["SKU001", "SKU002"];

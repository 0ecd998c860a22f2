export namespace normalization {
  export const DEFAULT_MAX_LENGTH = 100;

  /**
   * Upper bound on a name's UTF-8 length. File systems cap a path segment at
   * 255 bytes; the rest is left for the `.html` extension and the
   * `.tmp-<pid>-<n>` suffix of an atomic write.
   */
  export const MAX_NAME_BYTES = 200;

  const CONTROL_CHARACTERS = new RegExp("[\\u0000-\\u001f\\u007f-\\u009f]", "g");
  const RESERVED_DEVICE_NAMES = /^(con|prn|aux|nul|com[0-9]|lpt[0-9])(\..*)?$/i;

  /**
   * Turns a human-readable name into a file name that is safe on every
   * common file system while staying readable.
   *
   * @example
   * ```ts
   * normalization.sanitize("Q3: Plan / Review"); // "Q3_Plan_Review"
   * ```
   */
  export const sanitize = (name: string, maxLength: number = DEFAULT_MAX_LENGTH): string => {
    let safe = name
      .replace(/[<>:"/\\|?*]/g, "_") // Replace invalid characters
      .replace(CONTROL_CHARACTERS, "")
      .trim()
      .replace(/\s+/g, "_") // Replace whitespace with underscores
      .replace(/_{2,}/g, "_") // Replace multiple underscores with single
      .replace(/^_+|_+$/g, ""); // Remove leading/trailing underscores

    if (!safe) {
      safe = "untitled";
    }

    const characters = Array.from(safe);
    if (characters.length > maxLength) {
      safe = characters.slice(0, maxLength).join("").replace(/_+$/, "");
    }
    safe = fitBytes(safe, MAX_NAME_BYTES);

    if (RESERVED_DEVICE_NAMES.test(safe)) {
      safe = `${safe}_`;
    }

    return safe;
  };

  /**
   * Drops trailing code points until `name` takes at most `maxBytes` in UTF-8.
   */
  export const fitBytes = (name: string, maxBytes: number): string => {
    if (Buffer.byteLength(name, "utf8") <= maxBytes) {
      return name;
    }

    const characters = Array.from(name);
    let bytes = Buffer.byteLength(name, "utf8");
    while (characters.length > 0 && bytes > maxBytes) {
      bytes -= Buffer.byteLength(characters.pop() ?? "", "utf8");
    }
    return characters.join("").replace(/_+$/, "");
  };

  const withSuffix = (stem: string, suffix: string): string =>
    `${fitBytes(stem, MAX_NAME_BYTES - Buffer.byteLength(suffix, "utf8"))}${suffix}`;

  /**
   * Hands out collision-free file names within one directory.
   *
   * The first entity to claim a name keeps it. Later claimants of the same
   * name (compared case-insensitively) get `<name>_<id>`, then `_2`, `_3`...
   * if that is taken too. A suffixed name is shortened from the end of its
   * stem so it stays within {@link MAX_NAME_BYTES}. An entity claiming twice
   * gets its first name back.
   */
  export class FilenameRegistry {
    private readonly taken = new Set<string>();
    private readonly byId = new Map<string, string>();

    constructor(private readonly maxLength: number = DEFAULT_MAX_LENGTH) {}

    claim(id: string, name: string): string {
      const existing = this.byId.get(id);
      if (existing !== undefined) {
        return existing;
      }

      const base = sanitize(name, this.maxLength);
      let candidate = base;

      if (this.isTaken(candidate)) {
        candidate = withSuffix(base, `_${sanitize(id, this.maxLength)}`);
      }

      const suffixed = candidate;
      for (let counter = 2; this.isTaken(candidate); counter++) {
        candidate = withSuffix(suffixed, `_${counter}`);
      }

      this.taken.add(candidate.toLowerCase());
      this.byId.set(id, candidate);
      return candidate;
    }

    names(): ReadonlyMap<string, string> {
      return this.byId;
    }

    private isTaken(name: string): boolean {
      return this.taken.has(name.toLowerCase());
    }
  }
}

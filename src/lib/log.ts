import { bgBlack, bgBlue, bgGray, greenBright, red, yellow } from "ansis";
import { inspect as nodeInspect } from "util";

export namespace log {
  let verbose = false;

  const render = (args: unknown) => nodeInspect(args, { depth: null, colors: true, sorted: true });

  const write = (icon: string, message: string, args?: unknown) => {
    console.log(`${new Date().toISOString()} ${icon} ${message}`);
    if (args !== undefined) {
      console.log(render(args));
    }
  };

  /**
   * Enables debug and trace output.
   */
  export const configure = (options: { verbose?: boolean }) => {
    verbose = options.verbose ?? verbose;
  };

  export namespace debugging {
    export const inspect = (label: string, args: unknown) => {
      if (verbose) {
        write("🐛", bgGray(label), args);
      }
    };
  }

  export const info = (message: string, args?: unknown) => write("ℹ️", bgBlue(message), args);

  export const debug = (message: string, args?: unknown) => {
    if (verbose) {
      write("🐛", bgGray(message), args);
    }
  };

  export const trace = (message: string, args?: unknown) => {
    if (verbose) {
      write("🔍", bgBlack(message), args);
    }
  };

  export const success = (message: string, args?: unknown) => write("✅", greenBright(message), args);

  export const warning = (message: string, args?: unknown) => write("⚠️", yellow(message), args);

  export const error = (message: string, args?: unknown) => write("❌", red(message), args);
}

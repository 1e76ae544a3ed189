/**
 * Figure CLI
 *
 *   figure <spec.md> [--out figure.svg] [--width 960] [--height 640]
 */

import { parseArgs } from "node:util";
import { readFile, writeFile } from "node:fs/promises";
import { FigureGenerator } from "./figure";
import { CliOptionsSchema, validateRequest } from "./validation/schemas";
import { createLogger } from "./logging";

const log = createLogger("cli");

export const USAGE = "Usage: figure <spec> [--out figure.svg] [--width 960] [--height 640]";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/**
 * Run the CLI and resolve to a process exit code
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    io.stderr(USAGE);
    return 1;
  }

  const options = validateRequest(CliOptionsSchema, {
    spec: parsed.positionals[0],
    out: parsed.values.out,
    width: parsed.values.width,
    height: parsed.values.height,
  });
  if (!options.success) {
    io.stderr(`Invalid arguments: ${options.error}`);
    io.stderr(USAGE);
    return 1;
  }

  const { spec, out, width, height } = options.data;
  try {
    const text = await readFile(spec, "utf8");
    const generator = new FigureGenerator({ canvasWidth: width, canvasHeight: height });
    await writeFile(out, generator.generate(text), "utf8");
  } catch (error) {
    log.error("Figure generation failed", { spec, out, error });
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  io.stdout(`Saved SVG to ${out}`);
  return 0;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o" },
      width: { type: "string" },
      height: { type: "string" },
    },
  });
}

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import type { Context } from "../../context/index.js";
import { DatasetInput, Records, defineReader, defineWriter } from "../../step/variants.js";

export interface JsonFileReaderOptions {
  name?: string;
  /** Context path holding the file to read, e.g. `source.path`. */
  pathKey: string;
  context?: Context;
}

/** Reads a JSON array of records. */
export function jsonFileReader(options: JsonFileReaderOptions) {
  return defineReader(
    {
      name: options.name ?? "read-json",
      description: "Reads a JSON array of records from a file",
      requires: { [options.pathKey]: z.string().min(1) },
      output: z.object({ data: Records, source: z.string() }),
      idempotent: true,
      run({ config, logger }) {
        const source = resolve(config[options.pathKey]);
        let text: string;
        try {
          text = readFileSync(source, "utf-8");
        } catch (e) {
          throw new Error(`Failed to read ${source}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
        }
        let raw: unknown;
        try {
          raw = JSON.parse(text);
        } catch (e) {
          throw new Error(`Failed to parse JSON file '${source}': ${e instanceof Error ? e.message : String(e)}`, { cause: e });
        }
        const data = Records.safeParse(raw);
        if (!data.success) throw new Error(`${source} must contain a JSON array of objects`);
        logger.debug("read records", { source, count: data.data.length });
        return { data: data.data, source };
      },
    },
    { context: options.context }
  );
}

export interface JsonFileWriterOptions {
  name?: string;
  /** Context path holding the target file, e.g. `sink.path`. */
  targetKey: string;
  context?: Context;
}

/**
 * Writes the input dataset as pretty-printed JSON, creating parent directories.
 * Idempotent: the same records always produce the same file.
 */
export function jsonFileWriter(options: JsonFileWriterOptions) {
  return defineWriter(
    {
      name: options.name ?? "write-json",
      description: "Writes records to a JSON file",
      requires: { [options.targetKey]: z.string().min(1) },
      input: DatasetInput,
      output: z.object({ target: z.string(), count: z.number().int().nonnegative() }),
      idempotent: true,
      run({ config, logger }, { data }) {
        const target = resolve(config[options.targetKey]);
        mkdirSync(dirname(target), { recursive: true });
        writeFileSync(target, JSON.stringify(data, null, 2), "utf-8");
        logger.debug("wrote records", { target, count: data.length });
        return { target, count: data.length };
      },
    },
    { context: options.context }
  );
}

import { z } from "zod";
import type { Context } from "../../context/index.js";
import { DatasetInput, Records, defineTransformation, type Row } from "../../step/variants.js";

const DatasetOutput = z.object({ data: Records });

export function mapRecords(name: string, fn: (row: Row, index: number) => Row, context?: Context) {
  return defineTransformation(
    {
      name,
      requires: {},
      input: DatasetInput,
      output: DatasetOutput,
      idempotent: true,
      run: (_ctx, { data }) => ({ data: data.map(fn) }),
    },
    { context }
  );
}

export function filterRecords(name: string, predicate: (row: Row, index: number) => boolean, context?: Context) {
  return defineTransformation(
    {
      name,
      requires: {},
      input: DatasetInput,
      output: DatasetOutput,
      idempotent: true,
      run: (_ctx, { data }) => ({ data: data.filter(predicate) }),
    },
    { context }
  );
}

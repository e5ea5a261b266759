/**
 * Command: tensorgrad inspect
 */
import { Effect } from "effect";
import { CheckpointError, ModelStoreService } from "@tensorgrad/core";
import { formatTensor } from "@tensorgrad/tensor";
import { moduleFromRecord } from "@tensorgrad/nn";
import { requireArg } from "../parse.js";
import { resolveArgs, runCommand } from "../runtime.js";

export async function inspectCmd(args: string[]): Promise<void> {
  const { kv, engine } = await Effect.runPromise(resolveArgs(args));
  const path = requireArg(kv, "model", "path to a saved model");

  const program = Effect.gen(function* () {
    const store = yield* ModelStoreService;
    const record = yield* store.load(path);
    const model = yield* Effect.try({
      try: () => moduleFromRecord(record),
      catch: (e) => e instanceof CheckpointError
        ? e
        : new CheckpointError({ message: `Cannot rebuild ${record.tag}: ${e}`, cause: e }),
    });
    console.log(`model: ${model.tag()}`);
    model.parameters().forEach((p, i) => {
      console.log(`\nparameter ${i}:`);
      console.log(formatTensor(p));
    });
  });

  await runCommand(engine, program);
}

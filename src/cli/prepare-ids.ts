#!/usr/bin/env node
import { runPrepareIdentifiers } from "../composition/root";
import { reportCliFailure } from "./errorEnvelope";

export const executePrepareCli = async (): Promise<void> => {
  try {
    await runPrepareIdentifiers();
  } catch (err) {
    reportCliFailure("prepare.failed", err);
  }
};

if (require.main === module) {
  void executePrepareCli();
}

#!/usr/bin/env node
import { runCrawl } from "../composition/root";
import { reportCliFailure } from "./errorEnvelope";

export const executeCrawlCli = async (): Promise<void> => {
  try {
    await runCrawl();
  } catch (err) {
    reportCliFailure("crawl.failed", err);
  }
};

if (require.main === module) {
  void executeCrawlCli();
}

import { createStructuredLogger } from "@patricia-scan/shared";
import { JobRunner } from "../harness";
import { PERFORMANCE_JOBS } from "./job-configs";

const log = createStructuredLogger("bench");

function main() {
  log.info("Starting trie performance evaluation", {
    jobs: PERFORMANCE_JOBS.length,
  });

  const runner = new JobRunner();

  for (const jobConfig of PERFORMANCE_JOBS) {
    try {
      runner.run(jobConfig);
    } catch (error) {
      log.error(
        `Failed to run ${jobConfig.metadata.name}`,
        error instanceof Error ? error : new Error(String(error)),
      );
      process.exitCode = 1;
    }
  }
}

main();

import { ReportWriteError, errorMessage } from "../core/errors.js";
import { type Logger, createChildLogger } from "../logging/logger.js";
import type { ReportSection } from "../report/sections.js";
import type { ReportSink } from "./reportSink.js";

export interface PublishFailure {
  sink: string;
  /** null when the sink failed while closing */
  sectionId: string | null;
  message: string;
}

export interface PublishResult {
  sectionsWritten: number;
  failures: PublishFailure[];
}

/**
 * Writes every section to every sink. A failing section is recorded and the
 * remaining sections still go out; every sink is closed at the end.
 */
export async function publishReport(
  sections: readonly ReportSection[],
  sinks: readonly ReportSink[],
  logger: Logger = createChildLogger({ component: "publish" }),
): Promise<PublishResult> {
  let sectionsWritten = 0;
  const failures: PublishFailure[] = [];

  for (const sink of sinks) {
    for (const section of sections) {
      try {
        await sink.writeSection(section);
        sectionsWritten += 1;
      } catch (error) {
        const failure = new ReportWriteError(section.id, errorMessage(error), { cause: error });
        logger.error({ sink: sink.name, section: section.id }, failure.message);
        failures.push({ sink: sink.name, sectionId: section.id, message: failure.message });
      }
    }

    try {
      await sink.close();
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ sink: sink.name }, message);
      failures.push({ sink: sink.name, sectionId: null, message });
    }
  }

  return { sectionsWritten, failures };
}

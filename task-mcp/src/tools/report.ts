import { writeReports } from "@tasktrack/cli";
import type { ReportPaths } from "@tasktrack/cli";
import type { ToolContext, ToolResult } from "../types.js";
import { attempt } from "./result.js";

export async function generateReports(ctx: ToolContext): Promise<ToolResult<ReportPaths>> {
  return attempt(async () => {
    const { store, users, config } = ctx;
    const paths = await writeReports(config.reportDir, store.list(), users.list(), store.today());
    return {
      ok: true,
      message: `Reports written: ${paths.taskOverview}, ${paths.userOverview}`,
      data: paths,
    };
  });
}

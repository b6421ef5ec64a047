/**
 * ルートインデックス
 */

export { default as healthRoutes } from "./health";
export {
  CronRouteDependencies,
  createCronRouter,
  createIngestionReportHandler,
  summarizeRunResult,
} from "./cron";

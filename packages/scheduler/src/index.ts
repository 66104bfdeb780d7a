export {
  CronScheduler,
  type Job,
  type JobStatus,
  type JobTarget,
  type JobFunction,
  type JobRunContext,
  type FlowJobTarget,
  type AddJobOptions,
  type SchedulerOptions,
} from './scheduler';
export { computeNextRun, toSundayBased, validateCron, InvalidCronError } from './cron';
export {
  vpnConnected,
  acPowerConnected,
  screenLocked,
  not,
  all,
  SystemEnvironmentProbe,
  type JobCondition,
  type EnvironmentProbe,
  type SystemEnvironmentProbeOptions,
} from './conditions';

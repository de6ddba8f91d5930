export { type Job, type JobOutcome, type JobStatus, runJob, runJobs } from './driver.ts'

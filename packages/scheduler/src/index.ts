export * from "./types";
export * from "./clock";
export * from "./FieldCipher";

export * from "./ScheduleStore";
export * from "./ScheduleRunner";
export type { RunLimit } from "./utils/limiter";
export * from "./notices";

export * from "./ReminderStore";
export * from "./ReminderRunner";
export * from "./duration";

export * from "./parking";
export * from "./HttpActionExecutor";

import { GradingSession } from "../lib/grading/session.ts";
import { moduleLogger } from "../lib/logger.ts";

/** Parse cache shared by every tool call in this process */
export const session = new GradingSession();

export const log = moduleLogger("tools");

import pino from "pino";
import { env } from "../config/env";

export const logger = pino({ name: "dice-fairness", level: env.LOG_LEVEL });

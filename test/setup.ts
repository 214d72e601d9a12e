import "reflect-metadata";
import { Logger } from "@nestjs/common";

// Services log through Nest's Logger; keep test output to the reporter.
Logger.overrideLogger(false);

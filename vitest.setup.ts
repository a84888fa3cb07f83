import { setLogLevel } from "./core/logger";

setLogLevel("error");

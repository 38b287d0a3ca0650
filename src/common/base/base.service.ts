import { WithLogging } from "./mixins/logging.mixin";
import type { IBaseService } from "../types/services/base.types";

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {
    // Empty constructor
  }
}

/**
 * Base service class; every service gets a logger named after its class
 */
export abstract class BaseService extends WithLogging(SimpleBase) implements IBaseService {}

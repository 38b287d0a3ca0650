import { BaseService } from "./base.service";
import { WithLifecycle } from "./mixins/lifecycle.mixin";
import { WithMonitoring } from "./mixins/monitoring.mixin";

// Lifecycle hooks plus counters; the base of every stateful pipeline service
export abstract class StandardService extends WithMonitoring(WithLifecycle(BaseService)) {}

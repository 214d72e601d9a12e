import { ExecutionContext, Injectable, SetMetadata } from "@nestjs/common";
import { ThrottlerGuard } from "@nestjs/throttler";

export const SKIP_GLOBAL_THROTTLE_KEY = "skipGlobalThrottle";

/** For routes that apply their own throttler guard. */
export const SkipGlobalThrottle = () => SetMetadata(SKIP_GLOBAL_THROTTLE_KEY, true);

@Injectable()
export class GlobalThrottlerGuard extends ThrottlerGuard {
  protected async shouldSkip(context: ExecutionContext): Promise<boolean> {
    return (
      this.reflector.getAllAndOverride<boolean | undefined>(SKIP_GLOBAL_THROTTLE_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) === true
    );
  }
}

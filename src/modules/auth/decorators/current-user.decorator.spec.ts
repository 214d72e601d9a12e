import type { ExecutionContext } from "@nestjs/common";
import { ROUTE_ARGS_METADATA } from "@nestjs/common/constants";
import type { CustomParamFactory } from "@nestjs/common/interfaces";
import { describe, expect, it } from "vitest";
import { createAuthSession } from "../../../shared/helper.fixtures";
import { AUTH_SESSION_KEY, type AuthSession } from "../guards/session.guard";
import { CurrentUser } from "./current-user.decorator";

function factoryOf(decorator: () => ParameterDecorator): CustomParamFactory {
  class Host {
    handler(@decorator() _value: unknown) {}
  }

  const metadata = Reflect.getMetadata(ROUTE_ARGS_METADATA, Host, "handler");
  const [entry] = Object.values(metadata) as Array<{ factory: CustomParamFactory }>;
  return entry.factory;
}

const contextWith = (authSession: AuthSession | undefined): ExecutionContext =>
  ({
    switchToHttp: () => ({
      getRequest: () => ({ [AUTH_SESSION_KEY]: authSession }),
    }),
  }) as unknown as ExecutionContext;

describe("CurrentUser", () => {
  const factory = factoryOf(CurrentUser);

  it("returns the signed-in user", () => {
    const session = createAuthSession("Staff");

    expect(factory(undefined, contextWith(session))).toEqual(session.user);
  });

  it("returns null for a guest request", () => {
    expect(factory(undefined, contextWith(undefined))).toBeNull();
  });
});

import { describe, it, expect } from "vitest";
import { PluginDispatcher } from "./dispatcher";
import { makeContext, makeRuntime } from "../modules/test-helpers";
import type { PipelineStage, Plugin } from "../types";

function recorder(name: string, stages: PipelineStage[], calls: string[]): Plugin {
  const hooks: Plugin["hooks"] = {};
  for (const stage of stages) {
    hooks[stage] = () => {
      calls.push(`${name}:${stage}`);
    };
  }
  return { name, hooks };
}

describe("PluginDispatcher", () => {
  it("only invokes plugins for the stages they implement", async () => {
    const calls: string[] = [];
    const dispatcher = new PluginDispatcher([
      recorder("a", ["preBuild", "postBuild"], calls),
      recorder("b", ["postBuild"], calls),
    ]);

    expect(dispatcher.handlersFor("preBuild")).toEqual(["a"]);
    expect(dispatcher.handlersFor("postBuild")).toEqual(["a", "b"]);
    expect(dispatcher.handlersFor("postRender")).toEqual([]);

    const ctx = await makeContext();
    await dispatcher.dispatch("postBuild", ctx, makeRuntime());
    await dispatcher.dispatch("postRender", ctx, makeRuntime());

    expect(calls).toEqual(["a:postBuild", "b:postBuild"]);
  });

  it("keeps running later plugins when one throws", async () => {
    const calls: string[] = [];
    const dispatcher = new PluginDispatcher([
      {
        name: "broken",
        hooks: {
          postRender: async () => {
            throw new Error("boom");
          },
        },
      },
      recorder("after", ["postRender"], calls),
    ]);

    const ctx = await makeContext();
    await dispatcher.dispatch("postRender", ctx, makeRuntime());

    expect(calls).toEqual(["after:postRender"]);
    expect(ctx.tracker.getIssues("plugin")).toEqual([
      { type: "plugin", plugin: "broken", stage: "postRender", details: "boom" },
    ]);
  });

  it("passes the live context and both storages to hooks", async () => {
    const runtime = makeRuntime();
    const dispatcher = new PluginDispatcher([
      {
        name: "writer",
        hooks: {
          async preBuild({ stage, context, output }) {
            await output.writeText("stage.txt", `${stage}:${context.config.title}`);
          },
        },
      },
    ]);

    await dispatcher.dispatch("preBuild", await makeContext({ title: "Notes" }), runtime);

    expect(await runtime.output.readText("stage.txt")).toBe("preBuild:Notes");
  });

  it("propagates cancellation and skips the remaining plugins", async () => {
    const controller = new AbortController();
    const calls: string[] = [];
    const dispatcher = new PluginDispatcher([
      {
        name: "cancels",
        hooks: {
          buildComplete: ({ signal }) => {
            controller.abort();
            signal?.throwIfAborted();
          },
        },
      },
      recorder("later", ["buildComplete"], calls),
    ]);

    const ctx = await makeContext();
    await expect(
      dispatcher.dispatch("buildComplete", ctx, makeRuntime(undefined, undefined, controller.signal)),
    ).rejects.toBe(controller.signal.reason);

    expect(calls).toEqual([]);
    expect(ctx.tracker.getIssues()).toEqual([]);
  });

  it("returns plugins in registration order", () => {
    const dispatcher = new PluginDispatcher();
    dispatcher.register({ name: "first", hooks: {} });
    dispatcher.register({ name: "second", hooks: {} });

    expect(dispatcher.getPlugins().map((p) => p.name)).toEqual(["first", "second"]);
  });
});

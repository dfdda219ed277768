import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import {
  InvalidChildProcessCommandError,
  createChildProcessGateway,
  splitCommandLine,
  type SpawnImplementation,
} from "../src/gateways/childProcess.js";
import { InProcessServer } from "./helpers/inProcessServer.js";

describe("gateways/childProcess", () => {
  it("spawns without a shell and forwards args, env and cwd", () => {
    const server = new InProcessServer(async () => undefined);
    const spawnImpl = sinon.stub<Parameters<SpawnImplementation>, ReturnType<SpawnImplementation>>().returns(server);
    const gateway = createChildProcessGateway({ spawnImpl });

    const spawned = gateway.spawn({ command: " session-relay ", args: ["--root", "/srv/relay"], env: { A: "1" }, cwd: "/work" });

    expect(spawned).to.equal(server);
    expect(spawnImpl.calledOnce).to.equal(true);
    expect(spawnImpl.firstCall.args).to.deep.equal([
      "session-relay",
      ["--root", "/srv/relay"],
      { env: { A: "1" }, cwd: "/work", shell: false },
    ]);
  });

  it("omits cwd when none is given", () => {
    const spawnImpl = sinon.stub<Parameters<SpawnImplementation>, ReturnType<SpawnImplementation>>().returns(
      new InProcessServer(async () => undefined),
    );

    createChildProcessGateway({ spawnImpl }).spawn({ command: "session-relay", env: {} });

    expect(spawnImpl.firstCall.args[2]).to.deep.equal({ env: {}, shell: false });
  });

  it("rejects blank commands", () => {
    expect(() => createChildProcessGateway().spawn({ command: "   " })).to.throw(InvalidChildProcessCommandError);
  });

  it("splits command lines on whitespace", () => {
    expect(splitCommandLine("  session-relay   --root /srv/relay ")).to.deep.equal({
      command: "session-relay",
      args: ["--root", "/srv/relay"],
    });
    expect(splitCommandLine("")).to.deep.equal({ command: "", args: [] });
  });
});

import { describe, expect, test } from "vitest";
import { createOsActions, loadBuiltinApps, loadOsCommands, type OsActionsOptions } from "../src/os/actions.js";
import type { CmdOptions, CmdResult, CmdRunner } from "../src/runner/runCmd.js";

type Invocation = { cmd: string; args: string[]; opts?: CmdOptions };

const recorder = (result: CmdResult = { ok: true, code: 0, stdout: "", stderr: "" }) => {
  const invocations: Invocation[] = [];
  const runner: CmdRunner = async (cmd, args, opts) => {
    invocations.push({ cmd, args, opts });
    return result;
  };
  return { runner, invocations };
};

const actionsFor = (platform: NodeJS.Platform, extra: Partial<OsActionsOptions> = {}) => {
  const launched = recorder();
  const ran = recorder();
  const os = createOsActions({
    platform,
    commands: loadOsCommands(),
    runCmdImpl: ran.runner,
    spawnDetachedImpl: launched.runner,
    ...extra
  });
  return { os, launched: launched.invocations, ran: ran.invocations };
};

describe("command tables", () => {
  test("builtin items are per platform", () => {
    expect(loadBuiltinApps("win32").get("记事本")).toBe("notepad");
    expect(loadBuiltinApps("aix").size).toBe(0);
  });

  test("every power alias points at a known action", () => {
    const commands = loadOsCommands();
    const known = new Set(Object.values(commands.power).flatMap((table) => Object.keys(table)));
    Object.values(commands.powerAliases).forEach((canonical) => expect(known.has(canonical)).toBe(true));
  });
});

describe("createOsActions", () => {
  test("opens builtin items through the shell", async () => {
    const { os, launched } = actionsFor("win32");
    const result = await os.open({ kind: "builtin", name: "记事本", commandLine: "notepad" });

    expect(result).toEqual({ ok: true, message: "Opened system item: 记事本" });
    expect(launched).toEqual([{ cmd: "notepad", args: [], opts: { shell: true } }]);
  });

  test("picks the platform opener for paths", async () => {
    const windows = actionsFor("win32");
    await windows.os.open({ kind: "path", path: "C:\\Users\\me\\Desktop\\Work", isDirectory: true });
    await windows.os.open({ kind: "path", path: "C:\\Users\\me\\Desktop\\Code.lnk", isDirectory: false });
    expect(windows.launched.map((call) => [call.cmd, ...call.args])).toEqual([
      ["explorer", "C:\\Users\\me\\Desktop\\Work"],
      ["cmd", "/c", "start", "", "C:\\Users\\me\\Desktop\\Code.lnk"]
    ]);

    const linux = actionsFor("linux");
    const launchedDesktop = await linux.os.open({
      kind: "path",
      path: "/usr/share/applications/org.gnome.Calculator.desktop",
      isDirectory: false
    });
    await linux.os.open({ kind: "path", path: "/home/me/Desktop/Work", isDirectory: true });
    expect(launchedDesktop).toEqual({ ok: true, message: "Opened app: org.gnome.Calculator" });
    expect(linux.launched.map((call) => [call.cmd, ...call.args])).toEqual([
      ["gtk-launch", "org.gnome.Calculator"],
      ["xdg-open", "/home/me/Desktop/Work"]
    ]);

    const mac = actionsFor("darwin");
    const folder = await mac.os.open({ kind: "path", path: "/Users/me/Desktop/Work", isDirectory: true });
    expect(folder.message).toBe("Opened folder: Work");
    expect(mac.launched[0]?.cmd).toBe("open");
  });

  test("a failed launch reports stderr or the exit code", async () => {
    const failing = recorder({ ok: false, code: 1, stdout: "", stderr: "spawn xdg-open ENOENT\n" });
    const { os } = actionsFor("linux", { spawnDetachedImpl: failing.runner });
    expect(await os.open({ kind: "path", path: "/tmp/a", isDirectory: true })).toEqual({
      ok: false,
      message: "Opening /tmp/a failed: spawn xdg-open ENOENT"
    });

    const silent = recorder({ ok: false, code: 3, stdout: "", stderr: "" });
    const quiet = actionsFor("linux", { spawnDetachedImpl: silent.runner });
    expect((await quiet.os.clean()).message).toBe("System cleanup failed: exit code 3");
  });

  test("maps power aliases to the platform command", async () => {
    const { os, launched } = actionsFor("linux");
    expect(await os.power("关机")).toEqual({
      ok: true,
      message: "The system will shut down in 1 minute; save your work"
    });
    expect(launched).toEqual([{ cmd: "shutdown -h +1", args: [], opts: { shell: true } }]);
  });

  test("rejects unknown or unsupported power actions without running anything", async () => {
    const { os, launched } = actionsFor("darwin");
    expect(await os.power("dance")).toEqual({ ok: false, message: "Unsupported power action: dance" });
    expect(await os.power("休眠")).toEqual({
      ok: false,
      message: "Power action 'hibernate' is not supported on darwin"
    });
    expect(launched).toEqual([]);
  });

  test("system controls resolve both action and parameter aliases", async () => {
    const { os, ran } = actionsFor("linux");
    expect(await os.control("音量", "增大")).toEqual({ ok: true, message: "Volume raised" });
    expect(await os.control("WiFi", "off")).toEqual({ ok: true, message: "Networking disabled" });
    expect(ran.map((call) => call.cmd)).toEqual(["pactl set-sink-volume @DEFAULT_SINK@ +10%", "nmcli networking off"]);
  });

  test("unsupported system controls are reported", async () => {
    const { os, ran } = actionsFor("win32");
    expect(await os.control("亮度", "up")).toEqual({ ok: false, message: "Unsupported system control: 亮度|up" });
    expect(await os.control("volume", "up")).toEqual({
      ok: false,
      message: "System control 'volume up' is not supported on win32"
    });
    expect(ran).toEqual([]);
  });

  test("unsupported answers without running anything", () => {
    const { os, launched, ran } = actionsFor("darwin");
    expect(os.unsupported({ kind: "power", action: "foo" })).toBe("Unsupported power action: foo");
    expect(os.unsupported({ kind: "power", action: "休眠" })).toBe("Power action 'hibernate' is not supported on darwin");
    expect(os.unsupported({ kind: "power", action: "关机" })).toBeNull();
    expect(os.unsupported({ kind: "control", action: "音量", param: "增大" })).toBeNull();
    expect(os.unsupported({ kind: "control", action: "亮度", param: "up" })).toBe("Unsupported system control: 亮度|up");
    expect(os.unsupported({ kind: "clean" })).toBe("System cleanup is not supported on darwin");
    expect(launched).toEqual([]);
    expect(ran).toEqual([]);
  });

  test("cleanup runs only where a command exists", async () => {
    const mac = actionsFor("darwin");
    expect(await mac.os.clean()).toEqual({ ok: false, message: "System cleanup is not supported on darwin" });

    const linux = actionsFor("linux");
    expect(await linux.os.clean()).toEqual({ ok: true, message: "Thumbnail cache cleared" });
  });
});

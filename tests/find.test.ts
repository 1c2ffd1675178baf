/**
 * Unit tests for request correlation and response payload extraction.
 */
import { describe, test, expect } from "vitest";
import { extractResponsePayload, findRequest } from "../src/logs/find.js";
import { DiskStorage } from "../src/storage/disk.js";
import { API_LOG, FLUTTER_LOG, REQUEST_LOG, makeTmpDir } from "./fixtures.js";

const FILES = ["bundle/api.log", "bundle/flutter-api.log"];

async function makeBundle(): Promise<DiskStorage> {
  const storage = new DiskStorage(makeTmpDir());
  await storage.write(FILES[0], API_LOG);
  await storage.write(FILES[1], FLUTTER_LOG);
  return storage;
}

describe("findRequest", () => {
  test("returns the entry and its response payload", async () => {
    const storage = await makeBundle();
    const result = await findRequest(storage, FILES, "41");

    expect(result?.entry.file).toBe("bundle/api.log");
    expect(result?.entry.line).toBe(2);
    expect(result?.entry.endpoint).toBe("https://api.example.com/v1/users/7");
    expect(result?.payload).toBe('{"name": "Ada"}');
  });

  test("first match in file order wins", async () => {
    const storage = await makeBundle();
    const result = await findRequest(storage, [...FILES].reverse(), "41");
    expect(result?.entry.file).toBe("bundle/flutter-api.log");
    expect(result?.entry.endpoint).toBe("https://cdn.example.com/assets/logo.png");
  });

  test("first match within a file wins", async () => {
    const storage = await makeBundle();
    const result = await findRequest(storage, FILES, "42");
    expect(result?.entry.endpoint).toBe("https://api.example.com/v1/orders");
    expect(result?.payload).toBe('{"status": "created",\n  "id": 9001}');
  });

  test("searches later files", async () => {
    const storage = await makeBundle();
    const result = await findRequest(storage, FILES, "7");
    expect(result?.entry.file).toBe("bundle/flutter-api.log");
    expect(result?.payload).toBe('{"error": "Timeout"}');
  });

  test("payload is null without a response line", async () => {
    const storage = await makeBundle();
    const result = await findRequest(storage, FILES, "43");
    expect(result?.entry.endpoint).toBe("https://api.example.com/v1/health");
    expect(result?.payload).toBeNull();
  });

  test("ids match exactly", async () => {
    const storage = await makeBundle();
    expect(await findRequest(storage, FILES, "4")).toBeNull();
    expect(await findRequest(storage, FILES, "999")).toBeNull();
  });

  test("no log files means no match", async () => {
    const storage = await makeBundle();
    expect(await findRequest(storage, [], "41")).toBeNull();
  });
});

describe("findRequest on a request log without markers", () => {
  test("finds entries started by request lines", async () => {
    const storage = new DiskStorage(makeTmpDir());
    await storage.write("bundle/api.log", REQUEST_LOG);

    const ping = await findRequest(storage, ["bundle/api.log"], "99");
    expect(ping?.entry.line).toBe(1);
    expect(ping?.entry.endpoint).toBe("https://api.example.com/v1/ping");
    expect(ping?.payload).toBe("OK");

    const login = await findRequest(storage, ["bundle/api.log"], "100");
    expect(login?.payload).toBe("denied");
  });
});

describe("extractResponsePayload", () => {
  test("ignores response: on the marker line", () => {
    expect(extractResponsePayload("💡 #1 GET https://x.example.com/response: a\nbody\n")).toBeNull();
  });

  test("continues on the following lines when response: is bare", () => {
    expect(extractResponsePayload("💡 #1 x\nresponse:\n{\n}\n\nlater\n")).toBe("{\n}");
  });

  test("stops at the first blank line", () => {
    expect(extractResponsePayload("💡 #1 x\nresponse: a\nb\n   \nc\n")).toBe("a\nb");
  });

  test("handles CRLF bodies", () => {
    expect(extractResponsePayload("💡 #1 x\r\nresponse: ok\r\n\r\n")).toBe("ok");
  });
});

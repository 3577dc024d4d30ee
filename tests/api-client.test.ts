import { describe, it } from "mocha";
import { expect } from "chai";
import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { AxiosApiClient } from "../src/backend/api-client.js";
import { BackendError, TimeoutError } from "../src/errors.js";
import { rejectionOf } from "./helpers/fixtures.js";

const BASE_URL = "http://backend.test/api/";

// Answers every request with the given status and body, the way axios'
// own adapters settle: statuses outside 2xx reject with the response attached.
function respondWith(status: number, data: unknown, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", config, undefined, response);
    }
    return response;
  };
}

function failWith(code: string, message: string): AxiosAdapter {
  return async (config) => {
    throw new AxiosError(message, code, config);
  };
}

function client(adapter: AxiosAdapter): AxiosApiClient {
  return new AxiosApiClient({ baseUrl: BASE_URL, token: "test-secret", timeoutMs: 1000, adapter });
}

describe("AxiosApiClient", () => {
  it("sends the token and drops undefined query parameters", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const body = await client(respondWith(200, { items: [] }, seen)).get("v1/tasks", { tags: "primitive", name: undefined });

    expect(body).to.deep.equal({ items: [] });
    const [request] = seen;
    expect(request?.baseURL).to.equal(BASE_URL);
    expect(request?.url).to.equal("v1/tasks");
    expect(request?.params).to.deep.equal({ tags: "primitive" });
    expect(request?.headers.get("Authorization")).to.equal("test-secret");
  });

  it("posts JSON bodies", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    await client(respondWith(200, { id: "rule-1" }, seen)).post("v1/rules", { kind: "rule" });
    expect(JSON.parse(String(seen[0]?.data))).to.deep.equal({ kind: "rule" });
  });

  it("turns an error envelope into a backend error", async () => {
    const error = await rejectionOf(client(respondWith(200, { error: "bad filter" })).get("v1/tasks"));
    expect(error).to.be.instanceOf(BackendError);
    expect(error).to.have.property("message", "GET v1/tasks returned an error: bad filter");
    expect(error).to.have.property("status", 200);
  });

  it("reports the status and the body's message", async () => {
    const error = await rejectionOf(client(respondWith(404, { message: "no such task" })).get("v1/tasks"));
    expect(error).to.be.instanceOf(BackendError);
    expect(error).to.have.property("message", "GET v1/tasks failed with status 404: no such task");
    expect(error).to.have.property("status", 404);
  });

  it("maps timeouts", async () => {
    const error = await rejectionOf(client(failWith("ECONNABORTED", "timeout of 1000ms exceeded")).get("v1/tasks"));
    expect(error).to.be.instanceOf(TimeoutError);
    expect(error).to.have.property("message", "Request timed out after 1 seconds for GET v1/tasks");
  });

  it("reports requests that got no response", async () => {
    const error = await rejectionOf(client(failWith("ECONNREFUSED", "connect ECONNREFUSED")).post("v1/rules", {}));
    expect(error).to.be.instanceOf(BackendError);
    expect(error).to.have.property("message", "No response received for POST v1/rules: connect ECONNREFUSED");
  });
});

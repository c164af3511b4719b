import { describe, expect, it } from "vitest";
import { RestClientError } from "../src/errors.js";
import { HTTPResponse, stripAnsi } from "../src/http/response.js";

describe("HTTPResponse", () => {
  it("parses a response without headers or body", () => {
    const response = new HTTPResponse("HTTP/1.0 200 OK\r\n\r\n");

    expect(response.httpVersion).toBe("1.0");
    expect(response.statusCode).toBe(200);
    expect(response.reason).toBe("OK");
    expect(response.headers).toEqual({});
    expect(response.text).toBe("");
  });

  it("strips terminal escape sequences from headers and fixes doubled carriage returns", () => {
    const raw =
      "HTTP/1.0 200 OK\r\r\nContent-Type: application/json\x1b[0m\r\r\nServer: test\x1b[?25h\r\r\n\r\r\n" + '{"a":1}\r\n';

    const response = new HTTPResponse(raw);

    expect(response.headers).toEqual({ "Content-Type": "application/json", Server: "test" });
    expect(response.header("content-type")).toBe("application/json");
    expect(response.text).toBe('{"a":1}');
    expect(response.json()).toEqual({ a: 1 });
  });

  it("keeps escape sequences in the body", () => {
    const response = new HTTPResponse("HTTP/1.0 200 OK\n\ncolor \x1b[31mred");

    expect(response.text).toBe("color \x1b[31mred");
  });

  it("skips interim responses", () => {
    const response = new HTTPResponse(
      "HTTP/1.1 100 Continue\r\n\r\nHTTP/1.1 201 Created\r\nLocation: /items/1\r\n\r\n"
    );

    expect(response.statusCode).toBe(201);
    expect(response.reason).toBe("Created");
    expect(response.header("location")).toBe("/items/1");
  });

  it("keeps the last value of a repeated header", () => {
    const response = new HTTPResponse("HTTP/1.0 200 OK\r\nX-Trace: first\r\nX-Trace: second\r\n\r\n");

    expect(response.header("X-Trace")).toBe("second");
  });

  it("rejects output that is not an http response", () => {
    expect(() => new HTTPResponse("curl: (6) Could not resolve host")).toThrow(RestClientError);
  });

  it("renders json bodies with sorted keys", () => {
    const response = new HTTPResponse('HTTP/1.0 200 OK\r\n\r\n{"b":1,"a":[1,2]}');

    expect(response.toString()).toBe('200 OK\n{\n    "a": [\n        1,\n        2\n    ],\n    "b": 1\n}');
  });

  it("handles bodies that are not json", () => {
    const response = new HTTPResponse("HTTP/1.0 404 Not Found\r\n\r\nplain");

    expect(response.isValidJSON()).toBe(false);
    expect(() => response.json()).toThrow("http response body is not in a valid json format: plain");
    expect(response.toString()).toBe("404 Not Found\nplain");
    expect(() => response.checkForSuccess()).toThrow("http error received: 404 Not Found\nplain");
  });

  it("accepts 200 and 201 as success", () => {
    expect(() => new HTTPResponse("HTTP/1.0 201 Created\r\n\r\n").checkForSuccess()).not.toThrow();
    expect(() => new HTTPResponse("HTTP/1.0 204 No Content\r\n\r\n").checkForSuccess()).toThrow(RestClientError);
  });
});

describe("stripAnsi", () => {
  it("removes cursor and mode sequences", () => {
    expect(stripAnsi("\x1b[2Jtitle\x1b[1;1H\x1b=")).toBe("title");
  });
});

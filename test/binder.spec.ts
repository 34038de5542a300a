// test/binder.spec.ts
import { describe, it, expect, vi } from "vitest";
import { Binder } from "../src/binder/Binder";
import { field } from "../src/dsl/field";
import type { FieldsShape } from "../src/dsl/types";
import {
  DecodeError,
  DefaultValueError,
  FieldCoercionError,
  HookError,
  NilArgumentError,
  TransformError,
  UnsupportedDestinationError,
  isBindError,
} from "../src/errors/BindError";
import type { BindRequest } from "../src/request/BindRequest";
import type { ExtractionSource } from "../src/sources/ExtractionSource";
import type { UploadedFile } from "../src/dsl/upload";
import { HeaderSource } from "../src/sources/header.source";
import { QuerySource } from "../src/sources/query.source";
import {
  drain,
  jsonRequest,
  makeRequest,
  multipartRequest,
} from "./helpers/request";

class SearchQuery {
  static readonly fields = {
    term: field.string({ query: "q", string: "trim_space" }),
    page: field.uint16({ query: "page", default: "1" }),
    ids: field.list(field.int32(), { query: "id" }),
    traceId: field.optional(field.string({ header: "X-Trace-Id" })),
  } satisfies FieldsShape;

  term = "";
  page = 0;
  ids: number[] = [];
  traceId?: string;
}

class TokenHolder {
  static readonly fields = {
    token: field.string({ header: "X-Token", query: "token" }),
  } satisfies FieldsShape;

  token = "";
}

class CreateUser {
  static readonly fields = {
    name: field.string({ json: "user_name" }),
    age: field.uint8(),
    role: field.string({ query: "role", default: "member" }),
  } satisfies FieldsShape;

  name = "";
  age = 0;
  role = "";
  note = "";
}

class Session {
  static readonly fields = {
    sid: field.string({ cookie: "sid" }),
    userId: field.uint32({ path: "id" }),
  } satisfies FieldsShape;

  sid = "";
  userId = 0;
}

class BadDefault {
  static readonly fields = {
    limit: field.int8({ query: "limit", default: "abc" }),
  } satisfies FieldsShape;

  limit = 0;
}

class Shouty {
  static readonly fields = {
    code: field.string({ query: "code", string: "shout" }),
  } satisfies FieldsShape;

  code = "";
}

class Hooked {
  static readonly fields = {
    name: field.string({ query: "name" }),
  } satisfies FieldsShape;

  name = "";
  seen = "";

  afterBind(req: BindRequest): void {
    this.seen = `${req.method} ${this.name}`;
  }
}

class FailingHook {
  async afterBind(): Promise<void> {
    throw new Error("nope");
  }
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the bind to fail");
}

describe("Binder: source priority", () => {
  it("follows registration order, not annotation order", async () => {
    const req = () =>
      makeRequest({
        url: "/?token=fromQuery",
        headers: { "x-token": "fromHeader" },
      });

    const queryFirst = new Binder({
      sources: [new QuerySource(), new HeaderSource()],
    });
    const a = new TokenHolder();
    await queryFirst.bind(req(), a);
    expect(a.token).toBe("fromQuery");

    const headerFirst = new Binder({
      sources: [new HeaderSource(), new QuerySource()],
    });
    const b = new TokenHolder();
    await headerFirst.bind(req(), b);
    expect(b.token).toBe("fromHeader");
  });

  it("stops at the first source with a value", async () => {
    const extract = vi.fn<ExtractionSource["extract"]>(() => ({
      ok: true,
      value: "fromHeader",
    }));
    const header: ExtractionSource = { tag: "header", extract };
    const binder = new Binder({ sources: [new QuerySource(), header] });
    const holder = new TokenHolder();

    await binder.bind(makeRequest({ url: "/?token=fromQuery" }), holder);

    expect(holder.token).toBe("fromQuery");
    expect(extract).not.toHaveBeenCalled();
  });

  it("falls through to the next source when one has no value", async () => {
    const binder = new Binder();
    const holder = new TokenHolder();
    await binder.bind(
      makeRequest({ url: "/", headers: { "x-token": "fromHeader" } }),
      holder
    );
    expect(holder.token).toBe("fromHeader");
  });
});

describe("Binder: field resolution", () => {
  const binder = new Binder();

  it("binds query, list and header values", async () => {
    const q = new SearchQuery();
    await binder.bind(
      makeRequest({
        url: "/search?q=%20shoes%20&page=2&id=1&id=2",
        headers: { "x-trace-id": "t-1" },
      }),
      q
    );

    expect(q.term).toBe("shoes");
    expect(q.page).toBe(2);
    expect(q.ids).toEqual([1, 2]);
    expect(q.traceId).toBe("t-1");
  });

  it("splits a single comma-separated query value into a list", async () => {
    const q = new SearchQuery();
    await binder.bind(makeRequest({ url: "/?id=3,4" }), q);
    expect(q.ids).toEqual([3, 4]);
  });

  it("binds cookies and path parameters", async () => {
    const s = new Session();
    await binder.bind(
      makeRequest({
        url: "/users/42",
        headers: { cookie: "sid=abc123; theme=dark" },
        params: { id: "42" },
      }),
      s
    );

    expect(s.sid).toBe("abc123");
    expect(s.userId).toBe(42);
  });

  it("leaves pre-filled fields alone but still transforms them", async () => {
    const q = new SearchQuery();
    q.term = "  keep ";
    await binder.bind(makeRequest({ url: "/?q=other" }), q);
    expect(q.term).toBe("keep");
  });

  it("overwrites pre-filled fields when skipFilled is off", async () => {
    const q = new SearchQuery();
    q.term = "keep";
    await binder.bind(makeRequest({ url: "/?q=other" }), q, {
      skipFilled: false,
    });
    expect(q.term).toBe("other");
  });

  it("applies the default when no source yields a value", async () => {
    const q = new SearchQuery();
    await binder.bind(makeRequest({ url: "/" }), q);
    expect(q.page).toBe(1);
  });

  it("applies the default when the source yields a zero value", async () => {
    const q = new SearchQuery();
    await binder.bind(makeRequest({ url: "/?page=" }), q);
    expect(q.page).toBe(1);
  });

  it("does not apply the default over a bound value", async () => {
    const q = new SearchQuery();
    await binder.bind(makeRequest({ url: "/?page=5" }), q);
    expect(q.page).toBe(5);
  });

  it("exposes the cached descriptors", () => {
    const names = binder.describe(SearchQuery).map((d) => d.name);
    expect(names).toEqual(["term", "page", "ids", "traceId"]);
    expect(binder.describe(SearchQuery)).toBe(binder.describe(SearchQuery));
  });
});

describe("Binder: errors", () => {
  const binder = new Binder();

  it("wraps coercion failures with field, source and type", async () => {
    const err = await rejection(
      binder.bind(makeRequest({ url: "/?page=70000" }), new SearchQuery())
    );

    expect(err).toBeInstanceOf(FieldCoercionError);
    expect(isBindError(err, "CoercionError")).toBe(true);
    if (!isBindError(err, "CoercionError")) return;
    expect(err.field).toBe("page");
    expect(err.source).toBe("query");
    expect(err.typeName).toBe("SearchQuery");
    expect(err.message).toBe(
      "set value to field `page` from `query` for `SearchQuery`: value 70000 is outside the range of target type uint16 [0, 65535]"
    );
  });

  it("reports a default literal that does not convert", async () => {
    const err = await rejection(binder.bind(makeRequest(), new BadDefault()));

    expect(err).toBeInstanceOf(DefaultValueError);
    expect(err instanceof Error && err.message).toBe(
      "default value \"abc\" for field `limit` of `BadDefault`: cannot convert string 'abc' to int8"
    );
  });

  it("wraps transform failures", async () => {
    const err = await rejection(
      binder.bind(makeRequest({ url: "/?code=x" }), new Shouty())
    );

    expect(err).toBeInstanceOf(TransformError);
    expect(err instanceof Error && err.message).toBe(
      'transform `string` on field `code` of `Shouty`: unknown operation "shout"'
    );
  });

  it("rejects missing arguments", async () => {
    const noRequest = await rejection(binder.bind(null, new SearchQuery()));
    expect(noRequest).toBeInstanceOf(NilArgumentError);
    expect(isBindError(noRequest, "NilArgument") && noRequest.argument).toBe(
      "request"
    );

    const noDestination = await rejection(binder.bind(makeRequest(), undefined));
    expect(isBindError(noDestination, "NilArgument")).toBe(true);
    expect(noDestination instanceof Error && noDestination.message).toBe(
      "destination is nil"
    );
  });

  it("rejects destinations that are not records or collections", async () => {
    const err = await rejection(binder.bind(makeRequest(), () => 1));
    expect(err).toBeInstanceOf(UnsupportedDestinationError);
  });
});

describe("Binder: body decoding", () => {
  const binder = new Binder();

  it("dispatches on media type, ignoring parameters and case", async () => {
    const user = new CreateUser();
    await binder.bind(
      jsonRequest(
        { user_name: "ada", age: 36, note: "hi", extra: 1 },
        { headers: { "content-type": "Application/JSON; charset=utf-8" } }
      ),
      user
    );

    expect(user.name).toBe("ada");
    expect(user.age).toBe(36);
    expect(user.note).toBe("hi");
    expect(user.role).toBe("member");
    expect(Object.hasOwn(user, "extra")).toBe(false);
  });

  it("skips unregistered content types without reading the body", async () => {
    const req = makeRequest({
      method: "POST",
      headers: { "content-type": "text/plain" },
      body: "hello",
    });
    const user = new CreateUser();
    await binder.bind(req, user);

    expect(user.name).toBe("");
    expect(await drain(req.body)).toBe("hello");
  });

  it("skips bodies on GET", async () => {
    const user = new CreateUser();
    await binder.bind(
      jsonRequest({ user_name: "ada" }, { method: "GET" }),
      user
    );
    expect(user.name).toBe("");
  });

  it("skips requests with an empty declared body", async () => {
    const user = new CreateUser();
    await binder.bind(
      makeRequest({
        method: "POST",
        headers: {
          "content-type": "application/json",
          "content-length": "0",
        },
        body: "",
      }),
      user
    );
    expect(user.name).toBe("");
  });

  it("aborts before field resolution when decoding fails", async () => {
    const user = new CreateUser();
    const err = await rejection(
      binder.bind(
        makeRequest({
          method: "POST",
          headers: { "content-type": "application/json" },
          body: "{oops",
        }),
        user
      )
    );

    expect(err).toBeInstanceOf(DecodeError);
    if (!isBindError(err, "DecodeError")) return;
    expect(err.contentType).toBe("application/json");
    expect(err.typeName).toBe("CreateUser");
    expect(err.cause).toBeInstanceOf(SyntaxError);
    expect(user.role).toBe("");
  });

  it("decodes into plain objects and arrays", async () => {
    const bag: Record<string, unknown> = {};
    await binder.bind(jsonRequest({ a: 1, b: "x" }), bag);
    expect(bag).toEqual({ a: 1, b: "x" });

    const list: unknown[] = ["stale"];
    await binder.bind(jsonRequest([1, 2]), list);
    expect(list).toEqual([1, 2]);
  });

  it("fails when an object arrives for an array", async () => {
    const err = await rejection(binder.bind(jsonRequest({ a: 1 }), []));
    expect(err).toBeInstanceOf(DecodeError);
    expect(err instanceof Error && err.message).toBe(
      "decode `application/json` request body in `Array`: cannot decode Object into array"
    );
  });
});

describe("Binder: multipart bodies", () => {
  class Upload {
    static readonly fields = {
      title: field.string({ multipart: "title" }),
      avatar: field.file({ multipart: "avatar" }),
    } satisfies FieldsShape;

    title = "";
    avatar?: UploadedFile;
  }

  it("binds text and file parts with the default decoders", async () => {
    const upload = new Upload();
    await new Binder().bind(
      multipartRequest([
        { name: "title", value: "holiday" },
        {
          name: "avatar",
          value: "png-bytes",
          fileName: "a.png",
          contentType: "image/png",
        },
      ]),
      upload
    );

    expect(upload.title).toBe("holiday");
    expect(upload.avatar?.fileName).toBe("a.png");
    expect(upload.avatar?.mimeType).toBe("image/png");
    expect(upload.avatar?.text()).toBe("png-bytes");
  });
});

describe("Binder: date fields", () => {
  class Window {
    static readonly fields = {
      from: field.date({ query: "from", time: "start_of_day" }),
    } satisfies FieldsShape;

    from?: Date;
  }

  it("parses and transforms query dates", async () => {
    const w = new Window();
    await new Binder().bind(
      makeRequest({ url: "/?from=2024-05-06T13:14:15Z" }),
      w
    );
    expect(w.from?.toISOString()).toBe("2024-05-06T00:00:00.000Z");
  });
});

describe("Binder: body preservation", () => {
  const text = JSON.stringify({ user_name: "ada", age: 36 });

  it("leaves an identical body readable after decoding", async () => {
    const binder = new Binder({ preserveBody: true });
    const req = jsonRequest({ user_name: "ada", age: 36 });
    const user = new CreateUser();

    await binder.bind(req, user);

    expect(user.name).toBe("ada");
    expect(await drain(req.body)).toBe(text);
  });

  it("can be switched on per call", async () => {
    const binder = new Binder();
    const req = jsonRequest({ user_name: "ada", age: 36 });

    await binder.bind(req, new CreateUser(), { preserveBody: true });
    expect(await drain(req.body)).toBe(text);
  });

  it("rebinds the body when decoding fails", async () => {
    const binder = new Binder({ preserveBody: true });
    const req = makeRequest({
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{oops",
    });

    const err = await rejection(binder.bind(req, new CreateUser()));
    expect(err).toBeInstanceOf(DecodeError);
    expect(await drain(req.body)).toBe("{oops");
  });
});

describe("Binder: afterBind hook", () => {
  const binder = new Binder();

  it("runs after fields are resolved", async () => {
    const h = new Hooked();
    await binder.bind(makeRequest({ url: "/?name=ada" }), h);
    expect(h.seen).toBe("GET ada");
  });

  it("wraps a rejected hook as HookError", async () => {
    const err = await rejection(binder.bind(makeRequest(), new FailingHook()));

    expect(err).toBeInstanceOf(HookError);
    expect(err instanceof Error && err.message).toBe(
      "afterBind of `FailingHook`: nope"
    );
    expect(err instanceof Error && err.cause).toBeInstanceOf(Error);
  });
});

describe("Binder: configuration", () => {
  it("refuses duplicate source tags", () => {
    expect(
      () => new Binder({ sources: [new QuerySource(), new QuerySource()] })
    ).toThrow('Binder: duplicate source registration for "query".');
  });
});

import {
  DEFAULT_CATALOG,
  classifyBlockingIo,
  classifyMemoryLoad,
  classifyOrmQuery,
  describeMemoryLoad,
  extendCatalog,
  getAsyncAlternative,
  getMemoryOptimizationSuggestion,
  getOrmSuggestion,
  isBlockingIo,
  isMemoryIntensive,
  isOrmQuery,
  isTypeConversion,
  matchesName,
  readCatalogTables,
} from "../src/catalog";

describe("matchesName", () => {
  it("should support every match mode", () => {
    expect(matchesName({ mode: "exact", value: "time.sleep" }, "time.sleep")).toBe(true);
    expect(matchesName({ mode: "exact", value: "time.sleep" }, "xtime.sleep")).toBe(false);
    expect(matchesName({ mode: "prefix", value: "requests." }, "requests.put")).toBe(true);
    expect(matchesName({ mode: "suffix", value: ".read" }, "handle.read")).toBe(true);
    expect(matchesName({ mode: "suffix", value: ".read" }, "handle.readlines")).toBe(false);
    expect(matchesName({ mode: "substring", value: ".objects." }, "User.objects.all")).toBe(true);
  });

  it("should ignore case only when asked", () => {
    expect(matchesName({ mode: "exact", value: "open" }, "OPEN")).toBe(false);
    expect(matchesName({ mode: "exact", value: "open", ignoreCase: true }, "OPEN")).toBe(true);
  });
});

describe("ORM queries", () => {
  it("should classify written names by framework", () => {
    expect(classifyOrmQuery("User.objects.filter")).toBe("django");
    expect(classifyOrmQuery("objects.all")).toBe("django");
    expect(classifyOrmQuery("session.query")).toBe("sqlalchemy");
    expect(classifyOrmQuery("cursor.execute")).toBe("generic");
    expect(classifyOrmQuery("print")).toBeUndefined();
  });

  it("should classify resolved names against resolved entries only", () => {
    expect(classifyOrmQuery("qs.all", "shop.models.Order.objects.all")).toBe("django");
    expect(isOrmQuery("os.environ.get", "os.environ.get")).toBe(false);
    expect(isOrmQuery("os.environ.get")).toBe(true);
  });

  it("should suggest a fix per framework", () => {
    expect(getOrmSuggestion("sqlalchemy")).toBe(
      "Use joinedload() or subqueryload() to eager load related objects and reduce query count"
    );
  });
});

describe("blocking I/O", () => {
  it("should give the async alternative", () => {
    expect(classifyBlockingIo("open", "builtins.open")).toEqual({ alternative: "aiofiles.open" });
    expect(getAsyncAlternative("requests.get", "requests.get")).toBe("aiohttp.ClientSession.get");
    expect(getAsyncAlternative("requests.put", "requests.put")).toBe("aiohttp.ClientSession");
    expect(getAsyncAlternative("sleep", "time.sleep")).toBe("asyncio.sleep");
  });

  it("should flag calls that have no alternative", () => {
    expect(isBlockingIo("os.read", "os.read")).toBe(true);
    expect(getAsyncAlternative("os.read", "os.read")).toBeUndefined();
  });

  it("should match urllib written in any case", () => {
    expect(getAsyncAlternative("Urllib.Request.urlopen")).toBe("aiohttp.ClientSession");
  });

  it("should not flag a shadowed open", () => {
    expect(isBlockingIo("open", "shop.files.open")).toBe(false);
  });
});

describe("memory loads", () => {
  it("should classify loads by kind", () => {
    expect(classifyMemoryLoad("json.load", "json.load")).toBe("json");
    expect(classifyMemoryLoad("pickle.load")).toBe("pickle");
    expect(classifyMemoryLoad("handle.readlines")).toBe("readlines");
    expect(classifyMemoryLoad("data.read")).toBe("read");
    expect(isMemoryIntensive("json.loads", "json.loads")).toBe(false);
  });

  it("should describe and suggest per kind", () => {
    expect(describeMemoryLoad("readlines", "f.readlines")).toBe(
      "Reading all lines with f.readlines() loads entire file into memory"
    );
    expect(describeMemoryLoad("other", "load_all")).toBe(
      "Memory-intensive operation load_all() loads large amount of data into memory"
    );
    expect(getMemoryOptimizationSuggestion("json")).toBe(
      "Use ijson for streaming JSON parsing to avoid loading entire file into memory"
    );
  });
});

describe("type conversions", () => {
  it("should only match the builtins", () => {
    expect(isTypeConversion("int", "builtins.int")).toBe(true);
    expect(isTypeConversion("str")).toBe(true);
    expect(isTypeConversion("int", "shop.types.int")).toBe(false);
    expect(isTypeConversion("np.int64")).toBe(false);
  });
});

describe("catalog tables", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("should read valid entries and skip invalid ones", () => {
    const tables = readCatalogTables(
      {
        orm_queries: [
          { on: "written", mode: "suffix", value: ".lookup", framework: "generic" },
          { on: "written", mode: "suffix", value: ".bad", framework: "mongo" },
          { on: "sometimes", mode: "exact", value: "x", framework: "django" },
        ],
        memory_loads: [{ on: "resolved", mode: "exact", value: "numpy.load", kind: "other" }],
      },
      "test"
    );

    expect(tables.ormQueries).toEqual([
      { on: "written", match: { mode: "suffix", value: ".lookup" }, classification: "generic" },
    ]);
    expect(tables.memoryLoads).toHaveLength(1);
    expect(tables.blockingIo).toBeUndefined();
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("Skipping invalid catalog entry"));
  });

  it("should reject a catalog that is not a mapping", () => {
    expect(readCatalogTables(["nope"], "test")).toEqual({});
    expect(readCatalogTables(undefined, "test")).toEqual({});
  });

  it("should try extra entries before the defaults", () => {
    const extra = readCatalogTables(
      {
        blocking_io: [
          { on: "resolved", mode: "exact", value: "time.sleep", alternative: "trio.sleep" },
          { on: "written", mode: "suffix", value: ".fetch_sync" },
        ],
      },
      "test"
    );
    const catalog = extendCatalog(DEFAULT_CATALOG, extra);

    expect(getAsyncAlternative("time.sleep", "time.sleep", catalog)).toBe("trio.sleep");
    expect(isBlockingIo("api.fetch_sync", undefined, catalog)).toBe(true);
    expect(isBlockingIo("api.fetch_sync")).toBe(false);
    expect(catalog.ormQueries).toEqual(DEFAULT_CATALOG.ormQueries);
  });

  it("should keep the default catalog frozen", () => {
    expect(Object.isFrozen(DEFAULT_CATALOG)).toBe(true);
    expect(DEFAULT_CATALOG.typeConversions).toHaveLength(20);
  });
});

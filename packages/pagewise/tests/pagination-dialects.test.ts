import { sql } from "drizzle-orm";
import { describe, expect, it } from "vitest";

import { UnsupportedDialectError, ValidationError } from "../src/errors";
import { renderQuery, toRenderResult } from "../src/query/compiler";
import {
  getDialect,
  type PaginationDialect,
  renderPagination,
  SUPPORTED_DIALECTS,
} from "../src/query/dialect";
import { between, column, eq } from "../src/query/predicates";
import { fromBook } from "./fixtures";

const BODY =
  "select tb_1_.ID, tb_1_.NAME, tb_1_.PRICE, tb_1_.STORE_ID, tb_1_.AUTHOR_ID from BOOK as tb_1_ inner join BOOK_STORE as tb_2_ on tb_1_.STORE_ID = tb_2_.ID where tb_1_.PRICE between ? and ? order by tb_2_.NAME asc";

function pagedBookQuery(limit: number, offset: number) {
  const q = fromBook();
  const store = q.join(q.root, "store", "inner");
  return q
    .where(between(column(q.root, "PRICE"), 20, 40))
    .orderBy(column(store, "NAME"))
    .limit(limit, offset)
    .build();
}

describe("oracle", () => {
  it("wraps twice and filters on the row number for a later window", () => {
    expect(renderQuery(pagedBookQuery(10, 90), "oracle")).toEqual({
      sql: `select * from ( select core__.*, rownum rn__ from ( ${BODY} ) core__ where rownum <= ? ) limited__ where rn__ > ?`,
      params: [20, 40, 100, 90],
    });
  });

  it("wraps once for the first window", () => {
    expect(renderQuery(pagedBookQuery(10, 0), "oracle")).toEqual({
      sql: `select core__.* from ( ${BODY} ) core__ where rownum <= ?`,
      params: [20, 40, 10],
    });
  });
});

describe("limit / offset dialects", () => {
  it.each(["default", "postgres", "sqlite", "h2"])(
    "%s appends limit then offset",
    (dialect) => {
      expect(renderQuery(pagedBookQuery(10, 90), dialect)).toEqual({
        sql: `${BODY} limit ? offset ?`,
        params: [20, 40, 10, 90],
      });
    },
  );

  it("mysql binds the offset first", () => {
    expect(renderQuery(pagedBookQuery(10, 90), "mysql")).toEqual({
      sql: `${BODY} limit ?, ?`,
      params: [20, 40, 90, 10],
    });
  });

  it("sqlserver uses offset fetch", () => {
    expect(renderQuery(pagedBookQuery(10, 90), "sqlserver")).toEqual({
      sql: `${BODY} offset ? rows fetch next ? rows only`,
      params: [20, 40, 90, 10],
    });
  });
});

describe("renderQuery", () => {
  it("renders without paging when the query has none", () => {
    const q = fromBook();
    const query = q
      .select(column(q.root, "ID"))
      .where(eq(column(q.root, "NAME"), "Alpha"))
      .build();

    expect(renderQuery(query, "oracle")).toEqual({
      sql: "select tb_1_.ID from BOOK as tb_1_ where tb_1_.NAME = ?",
      params: ["Alpha"],
    });
  });

  it("uses the default dialect when none is given", () => {
    const q = fromBook();
    const query = q.select(column(q.root, "ID")).limit(5, 0).build();

    expect(renderQuery(query)).toEqual({
      sql: "select tb_1_.ID from BOOK as tb_1_ limit ? offset ?",
      params: [5, 0],
    });
  });

  it("rejects unknown dialect names", () => {
    expect(() => renderQuery(pagedBookQuery(10, 0), "db2")).toThrow(
      UnsupportedDialectError,
    );
  });
});

describe("getDialect", () => {
  it("lists the supported names", () => {
    expect(SUPPORTED_DIALECTS).toEqual([
      "default",
      "postgres",
      "sqlite",
      "h2",
      "mysql",
      "sqlserver",
      "oracle",
    ]);
  });

  it("does not resolve inherited object keys", () => {
    expect(() => getDialect("toString")).toThrow(UnsupportedDialectError);
  });

  it("passes a custom adapter through", () => {
    const fetchFirst: PaginationDialect = {
      name: "fetch-first",
      paginate: (body, limit, offset) =>
        sql`${body} offset ${offset} rows fetch first ${limit} rows only`,
    };

    const q = fromBook();
    const query = q.select(column(q.root, "ID")).limit(5, 10).build();

    expect(getDialect(fetchFirst)).toBe(fetchFirst);
    expect(renderQuery(query, fetchFirst)).toEqual({
      sql: "select tb_1_.ID from BOOK as tb_1_ offset ? rows fetch first ? rows only",
      params: [10, 5],
    });
  });
});

describe("renderPagination", () => {
  const body = sql`select 1`;

  it("paginates an arbitrary body", () => {
    expect(toRenderResult(renderPagination("mysql", body, 25, 50))).toEqual({
      sql: "select 1 limit ?, ?",
      params: [50, 25],
    });
  });

  it("rejects negative values", () => {
    expect(() => renderPagination("default", body, -1, 0)).toThrow(
      ValidationError,
    );
    expect(() => renderPagination("oracle", body, 10, -1)).toThrow(
      "Invalid paging: offset: Number must be greater than or equal to 0",
    );
  });

  it("rejects unknown dialects before validating values", () => {
    expect(() => renderPagination("db2", body, -1, 0)).toThrow(
      UnsupportedDialectError,
    );
  });
});

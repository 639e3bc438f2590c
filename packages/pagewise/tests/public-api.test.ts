/**
 * Exercises the package entry point the way the README example does.
 */
import { describe, expect, it } from "vitest";

import * as pw from "../src";

describe("package entry point", () => {
  const Book = pw.defineEntity("Book", {
    table: "BOOK",
    columns: ["NAME", "PRICE", "STORE_ID"],
  });
  const BookStore = pw.defineEntity("BookStore", {
    table: "BOOK_STORE",
    columns: ["NAME"],
  });
  const model = pw.defineModel({
    entities: [Book, BookStore],
    associations: {
      Book: {
        store: { target: "BookStore", foreignKey: "STORE_ID", nullable: true },
      },
    },
  });

  function build(engine: pw.Pagewise): pw.Query {
    const q = engine.from("Book");
    const store = q.join(q.root, "store", "left");
    return q
      .where(pw.between(pw.column(q.root, "PRICE"), 20, 40))
      .orderBy(pw.column(store, "NAME"))
      .limit(10, 90)
      .build();
  }

  it("renders the pruned count and the oracle page", () => {
    const engine = pw.createPagewise(model, { dialect: "oracle" });
    const query = build(engine);

    expect(engine.renderCount(query)).toEqual({
      sql: "select count(tb_1_.ID) from BOOK as tb_1_ where tb_1_.PRICE between ? and ?",
      params: [20, 40],
    });
    expect(engine.render(query)).toEqual({
      sql: "select * from ( select core__.*, rownum rn__ from ( select tb_1_.ID, tb_1_.NAME, tb_1_.PRICE, tb_1_.STORE_ID from BOOK as tb_1_ left join BOOK_STORE as tb_2_ on tb_1_.STORE_ID = tb_2_.ID where tb_1_.PRICE between ? and ? order by tb_2_.NAME asc ) core__ where rownum <= ? ) limited__ where rn__ > ?",
      params: [20, 40, 100, 90],
    });
  });

  it("exposes error classes for instanceof checks", () => {
    const engine = pw.createPagewise(model);
    const query = pw.deriveCountQuery(build(engine));

    expect(() => pw.reselect(query, [pw.column(query.root, "ID")])).toThrow(
      pw.ReselectNotAllowedError,
    );
    expect(pw.isUserRecoverable(new pw.UnknownEntityError("Shop"))).toBe(true);
  });

  it("generates distinct ids", () => {
    expect(pw.generateId()).not.toBe(pw.generateId());
  });
});

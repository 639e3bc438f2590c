import { describe, expect, it } from "vitest";

import { type ClauseKind } from "../src/query/ast";
import { createQueryBuilder } from "../src/query/builder";
import { planCountQuery, renderCountQuery } from "../src/query/compiler";
import { analyzeClauseUsage } from "../src/query/compiler/passes/clause-usage";
import {
  eliminateJoins,
  isEliminable,
} from "../src/query/compiler/passes/join-elimination";
import {
  between,
  column,
  eq,
  exists,
  isNotNull,
} from "../src/query/predicates";
import { reselect } from "../src/query/reselect";
import { fromBook, model } from "./fixtures";

function clauses(...kinds: ClauseKind[]): ReadonlySet<ClauseKind> {
  return new Set(kinds);
}

function keys(references: Iterable<{ key: string }>): string[] {
  return [...references].map((reference) => reference.key);
}

describe("count query join elimination", () => {
  it("keeps an inner join over a nullable foreign key", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "inner");
    const query = q
      .where(between(column(q.root, "PRICE"), 20, 40))
      .orderBy(column(store, "NAME"))
      .build();

    expect(renderCountQuery(query)).toEqual({
      sql: "select count(tb_1_.ID) from BOOK as tb_1_ inner join BOOK_STORE as tb_2_ on tb_1_.STORE_ID = tb_2_.ID where tb_1_.PRICE between ? and ?",
      params: [20, 40],
    });
  });

  it("drops a left join used only for ordering", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const query = q
      .where(between(column(q.root, "PRICE"), 20, 40))
      .orderBy(column(store, "NAME"))
      .build();

    expect(renderCountQuery(query)).toEqual({
      sql: "select count(tb_1_.ID) from BOOK as tb_1_ where tb_1_.PRICE between ? and ?",
      params: [20, 40],
    });
    expect(keys(planCountQuery(query).eliminated)).toEqual([
      "Book.store(left)",
    ]);
  });

  it("drops an inner join over a non-null foreign key", () => {
    const q = fromBook();
    const author = q.join(q.root, "author", "inner");
    const query = q.orderBy(column(author, "NAME")).build();

    expect(renderCountQuery(query).sql).toBe(
      "select count(tb_1_.ID) from BOOK as tb_1_",
    );
  });

  it("keeps a left join used in the where clause", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const query = q.where(eq(column(store, "NAME"), "North")).build();

    expect(renderCountQuery(query)).toEqual({
      sql: "select count(tb_1_.ID) from BOOK as tb_1_ left join BOOK_STORE as tb_2_ on tb_1_.STORE_ID = tb_2_.ID where tb_2_.NAME = ?",
      params: ["North"],
    });
  });

  it("keeps collection joins even when unused", () => {
    const q = fromBook();
    q.join(q.root, "reviews", "left");
    const query = q.build();

    expect(renderCountQuery(query).sql).toBe(
      "select count(tb_1_.ID) from BOOK as tb_1_ left join REVIEW as tb_2_ on tb_1_.ID = tb_2_.BOOK_ID",
    );
  });

  it("drops a whole subtree when every member is eliminable", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const city = q.join(store, "city", "left");
    const query = q.orderBy(column(city, "NAME")).build();
    const plan = planCountQuery(query);

    expect(keys(plan.eliminated)).toEqual([
      "Book.store(left)",
      "Book.store(left).city(left)",
    ]);
    expect(keys(plan.retained)).toEqual(["Book"]);
  });

  it("keeps an inner join below a left join", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const city = q.join(store, "city", "inner");
    const query = q.orderBy(column(city, "NAME")).build();

    expect(renderCountQuery(query).sql).toBe(
      "select count(tb_1_.ID) from BOOK as tb_1_ left join BOOK_STORE as tb_2_ on tb_1_.STORE_ID = tb_2_.ID inner join CITY as tb_3_ on tb_2_.CITY_ID = tb_3_.ID",
    );
  });

  it("keeps a parent whose subtree holds a filtering join", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const city = q.join(store, "city", "inner");
    const query = q.where(eq(column(city, "NAME"), "Lyon")).build();

    expect(renderCountQuery(query)).toEqual({
      sql: "select count(tb_1_.ID) from BOOK as tb_1_ left join BOOK_STORE as tb_2_ on tb_1_.STORE_ID = tb_2_.ID inner join CITY as tb_3_ on tb_2_.CITY_ID = tb_3_.ID where tb_3_.NAME = ?",
      params: ["Lyon"],
    });
  });

  it("keeps the children of a retained join", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const city = q.join(store, "city", "left");
    const query = q
      .where(isNotNull(column(store, "NAME")))
      .orderBy(column(city, "NAME"))
      .build();
    const plan = planCountQuery(query);

    expect(plan.eliminated).toEqual([]);
    expect(keys(plan.retained)).toEqual([
      "Book",
      "Book.store(left)",
      "Book.store(left).city(left)",
    ]);
  });

  it("numbers aliases of the retained references consecutively", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const author = q.join(q.root, "author", "left");
    const query = q
      .where(eq(column(author, "NAME"), "Ada"))
      .orderBy(column(store, "NAME"))
      .build();

    expect(renderCountQuery(query).sql).toBe(
      "select count(tb_1_.ID) from BOOK as tb_1_ left join AUTHOR as tb_2_ on tb_1_.AUTHOR_ID = tb_2_.ID where tb_2_.NAME = ?",
    );
  });

  it("keeps joins that a sub-query correlates on", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const sub = createQueryBuilder(model, "Review");
    const subquery = sub
      .select(column(sub.root, "ID"))
      .where(eq(column(sub.root, "BOOK_ID"), column(store, "ID")))
      .build();
    const query = q.where(exists(subquery)).build();

    expect(renderCountQuery(query).sql).toBe(
      "select count(tb_1_.ID) from BOOK as tb_1_ left join BOOK_STORE as tb_2_ on tb_1_.STORE_ID = tb_2_.ID where exists(select tb_3_.ID from REVIEW as tb_3_ where tb_3_.BOOK_ID = tb_2_.ID)",
    );
  });

  it("never prunes joins inside a sub-query", () => {
    const q = fromBook();
    const sub = createQueryBuilder(model, "Review");
    sub.join(sub.root, "book", "left");
    const subquery = sub
      .select(column(sub.root, "ID"))
      .where(eq(column(sub.root, "BOOK_ID"), column(q.root, "ID")))
      .build();
    const query = q.where(exists(subquery)).build();

    expect(renderCountQuery(query).sql).toBe(
      "select count(tb_1_.ID) from BOOK as tb_1_ where exists(select tb_2_.ID from REVIEW as tb_2_ left join BOOK as tb_3_ on tb_2_.BOOK_ID = tb_3_.ID where tb_2_.BOOK_ID = tb_1_.ID)",
    );
  });

  it("retains references selected by the derived query", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const query = q.orderBy(column(store, "NAME")).build();
    const derived = reselect(query, [column(store, "NAME")]);

    const result = eliminateJoins(derived, analyzeClauseUsage(query));

    expect(keys(result.retained)).toEqual(["Book", "Book.store(left)"]);
    expect(result.eliminated).toEqual([]);
  });

  it("does not change the data query", () => {
    const q = fromBook();
    const store = q.join(q.root, "store", "left");
    const query = q.orderBy(column(store, "NAME")).build();
    planCountQuery(query);

    expect(query.registry.references()).toHaveLength(2);
    expect(query.orderBy).toHaveLength(1);
    expect(query.isDerived).toBe(false);
  });
});

describe("isEliminable", () => {
  const q = fromBook();
  const leftStore = q.join(q.root, "store", "left");
  const innerStore = q.join(q.root, "store", "inner");
  const innerAuthor = q.join(q.root, "author", "inner");
  const reviews = q.join(q.root, "reviews", "left");
  const cityBelowLeft = q.join(leftStore, "city", "inner");
  const cityBelowInner = q.join(innerStore, "city", "inner");

  it("accepts to-one left joins used only for results", () => {
    expect(isEliminable(leftStore, clauses())).toBe(true);
    expect(isEliminable(leftStore, clauses("select", "orderBy"))).toBe(true);
  });

  it("rejects joins used for filtering", () => {
    expect(isEliminable(leftStore, clauses("where"))).toBe(false);
    expect(isEliminable(leftStore, clauses("groupBy"))).toBe(false);
    expect(isEliminable(leftStore, clauses("orderBy", "having"))).toBe(false);
  });

  it("accepts inner joins only over non-null foreign keys", () => {
    expect(isEliminable(innerStore, clauses("orderBy"))).toBe(false);
    expect(isEliminable(innerAuthor, clauses("orderBy"))).toBe(true);
  });

  it("rejects inner joins whose parent is left joined", () => {
    expect(isEliminable(cityBelowLeft, clauses("orderBy"))).toBe(false);
    expect(isEliminable(cityBelowInner, clauses("orderBy"))).toBe(true);
  });

  it("rejects collections", () => {
    expect(isEliminable(reviews, clauses())).toBe(false);
  });
});

/**
 * Shared library model for tests.
 *
 * Book.store     many-to-one, nullable foreign key
 * Book.author    many-to-one, non-null foreign key
 * Book.reviews   one-to-many collection
 * BookStore.city many-to-one, non-null foreign key
 * BookStore.books one-to-many collection
 * Review.book    many-to-one, non-null foreign key
 */
import type Database from "better-sqlite3";

import { defineEntity, defineModel } from "../src/core";
import { createQueryBuilder, type QueryBuilder } from "../src/query/builder";

export const Book = defineEntity("Book", {
  table: "BOOK",
  columns: ["NAME", "PRICE", "STORE_ID", "AUTHOR_ID"],
});

export const BookStore = defineEntity("BookStore", {
  table: "BOOK_STORE",
  columns: ["NAME", "CITY_ID"],
});

export const City = defineEntity("City", {
  table: "CITY",
  columns: ["NAME"],
});

export const Author = defineEntity("Author", {
  table: "AUTHOR",
  columns: ["NAME"],
});

export const Review = defineEntity("Review", {
  table: "REVIEW",
  columns: ["BOOK_ID", "RATING"],
});

export const model = defineModel({
  entities: [Book, BookStore, City, Author, Review],
  associations: {
    Book: {
      store: { target: "BookStore", foreignKey: "STORE_ID", nullable: true },
      author: { target: "Author", foreignKey: "AUTHOR_ID" },
      reviews: { target: "Review", mappedBy: "BOOK_ID", collection: true },
    },
    BookStore: {
      city: { target: "City", foreignKey: "CITY_ID" },
      books: { target: "Book", mappedBy: "STORE_ID", collection: true },
    },
    Review: {
      book: { target: "Book", foreignKey: "BOOK_ID" },
    },
  },
});

export function fromBook(): QueryBuilder {
  return createQueryBuilder(model, "Book");
}

/**
 * Schema and rows for the library model. Every non-null foreign key points
 * at an existing row.
 */
const LIBRARY_DDL: readonly string[] = [
  "create table CITY (ID integer primary key, NAME text not null)",
  "create table AUTHOR (ID integer primary key, NAME text not null)",
  "create table BOOK_STORE (ID integer primary key, NAME text not null, CITY_ID integer not null references CITY(ID))",
  "create table BOOK (ID integer primary key, NAME text not null, PRICE integer not null, STORE_ID integer references BOOK_STORE(ID), AUTHOR_ID integer not null references AUTHOR(ID))",
  "create table REVIEW (ID integer primary key, BOOK_ID integer not null references BOOK(ID), RATING integer not null)",
  "insert into CITY values (1, 'Lyon'), (2, 'Oslo')",
  "insert into AUTHOR values (1, 'Ada'), (2, 'Bruno')",
  "insert into BOOK_STORE values (1, 'North', 1), (2, 'South', 2), (3, 'East', 1)",
  "insert into BOOK values (1, 'Alpha', 15, 1, 1), (2, 'Beta', 25, 1, 2), (3, 'Gamma', 35, 2, 1), (4, 'Delta', 45, null, 2), (5, 'Epsilon', 55, null, 1), (6, 'Zeta', 30, 3, 2)",
  "insert into REVIEW values (1, 1, 5), (2, 1, 3), (3, 2, 4), (4, 3, 2), (5, 3, 5), (6, 3, 4)",
];

export function seedLibrary(db: Database.Database): void {
  for (const statement of LIBRARY_DDL) {
    db.exec(statement);
  }
}

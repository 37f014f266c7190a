import type { Article, Author } from "../model/article.model"

/** Starter rows for the in-memory driver. */
export const seedAuthors: readonly Author[] = [
  { id: 1, name: "Mira Okafor" },
  { id: 2, name: "Tomas Lind" },
]

export function seedArticles(): Article[] {
  return [
    {
      id: 1,
      slug: "read-through-basics",
      title: "Read-through basics",
      status: "published",
      authorId: 1,
      publishedAt: new Date("2025-03-01T09:00:00.000Z"),
    },
    {
      id: 2,
      slug: "keys-and-variants",
      title: "Keys and variants",
      status: "published",
      authorId: 2,
      publishedAt: new Date("2025-03-08T09:00:00.000Z"),
    },
    {
      id: 3,
      slug: "invalidating-on-write",
      title: "Invalidating on write",
      status: "draft",
      authorId: 1,
      publishedAt: null,
    },
  ]
}

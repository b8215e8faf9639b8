import { Faker, en } from "@faker-js/faker";

export type NameGenerator = () => string;

/** Seeded generators repeat the same sequence of names. */
export function createNameGenerator(seed?: number): NameGenerator {
  const faker = new Faker({ locale: [en] });
  if (seed !== undefined) {
    faker.seed(seed);
  }
  return () => faker.person.fullName();
}

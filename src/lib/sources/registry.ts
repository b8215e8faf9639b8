import { ReviewSourceModule } from "./types";
import { aliexpress } from "./aliexpress";

const ALL_SOURCES: ReviewSourceModule[] = [aliexpress];

export function getSource(name: string): ReviewSourceModule | undefined {
  const lower = name.toLowerCase();
  return ALL_SOURCES.find((s) => s.name === lower);
}

export function getAllSourceNames(): string[] {
  return ALL_SOURCES.map((s) => s.name);
}

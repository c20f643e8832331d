import type { Actor } from "../types.js";

const splitIdentity = (value: string) => {
  const trimmed = value.trim();
  const pipeAt = trimmed.indexOf("|");
  if (pipeAt <= 0) {
    return { idPart: trimmed, userPart: "" };
  }
  return {
    idPart: trimmed.slice(0, pipeAt),
    userPart: trimmed.slice(pipeAt + 1)
  };
};

const normalizeName = (value: string) => value.trim().replace(/^@/, "").toLowerCase();

/**
 * Matches an actor against configured admin entries. An entry is a numeric user
 * id (`12345`), a username (`@alice`), or both (`12345|alice`). Usernames only
 * count when written with `@` or after the pipe, so a bare number never matches
 * a username. An empty list admits nobody.
 */
export const isAdminIdentity = (adminIds: string[], actor: Actor): boolean => {
  const userId = String(actor.userId);
  const username = actor.username ? normalizeName(actor.username) : "";

  for (const entry of adminIds) {
    const raw = entry.trim();
    if (!raw) {
      continue;
    }
    if (raw.startsWith("@")) {
      if (username !== "" && normalizeName(raw) === username) {
        return true;
      }
      continue;
    }

    const allowed = splitIdentity(raw);
    if (actor.userId !== 0 && allowed.idPart === userId) {
      return true;
    }
    if (allowed.userPart !== "" && username !== "" && normalizeName(allowed.userPart) === username) {
      return true;
    }
  }

  return false;
};

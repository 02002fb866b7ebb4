/*
  The session lives in the host application; views only need to know
  whether to offer edit affordances.
*/
export interface Viewer {
  authenticated: boolean;
  name?: string;
}

export const ANONYMOUS: Viewer = Object.freeze({ authenticated: false });

export function isAuthenticated(viewer: Viewer | null | undefined): boolean {
  return viewer?.authenticated === true;
}

export function viewerFromSession(session: { userId?: string | null; name?: string } | null | undefined): Viewer {
  if (!session?.userId) return ANONYMOUS;
  return session.name ? { authenticated: true, name: session.name } : { authenticated: true };
}

import {
  ScreenScope,
  type ScreenScopeOptions,
  TaskScope,
  type TaskScopeOptions,
} from "@studyshelf/ui-runtime";
import { useEffect, useState } from "react";

interface Destroyable {
  readonly isDestroyed: boolean;
  destroy(): void;
}

/**
 * Keep a scope alive for as long as the component is mounted.
 *
 * The effect recreates the scope when it finds it destroyed (StrictMode
 * mounts twice) or created for a different key.
 */
function useOwnedScope<S extends Destroyable>(
  key: string,
  create: () => S,
  matches: (scope: S) => boolean,
): S {
  const [scope, setScope] = useState(create);

  useEffect(() => {
    let current = scope;
    if (current.isDestroyed || !matches(current)) {
      current = create();
      setScope(current);
    }
    return () => current.destroy();
  }, [key]);

  return scope;
}

/**
 * ScreenScope that is destroyed exactly once when the component unmounts.
 *
 * `opts` is read when the scope is created. Changing it afterwards has no
 * effect until `screenId` changes.
 */
export function useScreenScope(
  screenId: string,
  opts: ScreenScopeOptions = {},
): ScreenScope {
  return useOwnedScope(
    screenId,
    () => new ScreenScope(screenId, opts),
    (scope) => scope.screenId === screenId,
  );
}

/**
 * TaskScope that is destroyed when the component unmounts. Like
 * `useScreenScope`, `opts` is only read on creation.
 */
export function useTaskScope(id: string, opts: TaskScopeOptions = {}): TaskScope {
  return useOwnedScope(
    id,
    () => new TaskScope(id, opts),
    (scope) => scope.id === id,
  );
}

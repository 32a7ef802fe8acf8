/**
 * A named unit of work in a task group
 */
export interface Task<T> {
  name: string;
  run: () => Promise<T>;
}

export interface TaskGroupOptions {
  /**
   * Start every task at once. When false the tasks run one after another.
   */
  concurrent?: boolean;
}

/**
 * Run a group of tasks and wait for all of them to settle. If any failed,
 * the first failure (in task order) is rethrown after the others finish, so
 * no task is left running behind the caller's back.
 */
export async function runTaskGroup<T>(
  tasks: Task<T>[],
  options: TaskGroupOptions = {}
): Promise<T[]> {
  const concurrent = options.concurrent ?? true;

  let settled: PromiseSettledResult<T>[];
  if (concurrent) {
    settled = await Promise.allSettled(tasks.map((task) => task.run()));
  } else {
    settled = [];
    for (const task of tasks) {
      try {
        settled.push({ status: "fulfilled", value: await task.run() });
      } catch (reason) {
        settled.push({ status: "rejected", reason });
      }
    }
  }

  const results: T[] = [];
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }
  return results;
}

import type { NewTodo } from "./entities/todo";

// Inserted on first start and on every reset, in this order.
export const SEED_TODOS: readonly Required<NewTodo>[] = [
  { title: "Learn TypeScript", description: "Build a REST API with Express", completed: false },
  { title: "Go grocery shopping", description: "Buy vegetables and fruit", completed: false },
  { title: "Run on Monday", description: "Do a 5 km run", completed: false },
];

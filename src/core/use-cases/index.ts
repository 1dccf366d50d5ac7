import type { TodoRepository } from "../ports/TodoRepository";
import makeCreateTodo from "./createTodo";
import makeDeleteTodo from "./deleteTodo";
import makeGetTodo from "./getTodo";
import makeGetTodoStats from "./getTodoStats";
import makeListTodos from "./listTodos";
import makeResetTodos from "./resetTodos";
import makeToggleTodo from "./toggleTodo";
import makeUpdateTodo from "./updateTodo";

export function makeTodoUseCases(repo: TodoRepository) {
  return {
    createTodo: makeCreateTodo(repo),
    listTodos: makeListTodos(repo),
    getTodo: makeGetTodo(repo),
    updateTodo: makeUpdateTodo(repo),
    deleteTodo: makeDeleteTodo(repo),
    toggleTodo: makeToggleTodo(repo),
    getTodoStats: makeGetTodoStats(repo),
    resetTodos: makeResetTodos(repo),
  };
}

export type TodoUseCases = ReturnType<typeof makeTodoUseCases>;

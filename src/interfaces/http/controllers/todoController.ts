import type { Request, Response } from "express";
import type { Todo, TodoPatch, TodoStats, TodoStatus } from "../../../core/entities/todo";
import { presentStats, presentTodo } from "../presenters/todoPresenter";
import {
  type CreateTodoBody,
  parseCreateTodoBody,
  parseStatusQuery,
  parseTodoId,
  parseUpdateTodoBody,
} from "../validation";

export interface TodoControllerDeps {
  createTodo: (input: CreateTodoBody) => Promise<Todo>;
  listTodos: (status?: TodoStatus) => Promise<Todo[]>;
  getTodo: (id: number) => Promise<Todo>;
  updateTodo: (id: number, data: TodoPatch) => Promise<Todo>;
  deleteTodo: (id: number) => Promise<void>;
  toggleTodo: (id: number) => Promise<Todo>;
  getTodoStats: () => Promise<TodoStats>;
}

export default function createTodoController(deps: TodoControllerDeps) {
  return {
    list: async (req: Request, res: Response) => {
      const items = await deps.listTodos(parseStatusQuery(req.query.status));
      return res.status(200).json(items.map(presentTodo));
    },

    get: async (req: Request, res: Response) => {
      const item = await deps.getTodo(parseTodoId(req.params.id));
      return res.status(200).json(presentTodo(item));
    },

    create: async (req: Request, res: Response) => {
      const created = await deps.createTodo(parseCreateTodoBody(req.body));
      return res.status(201).json(presentTodo(created));
    },

    update: async (req: Request, res: Response) => {
      const id = parseTodoId(req.params.id);
      const updated = await deps.updateTodo(id, parseUpdateTodoBody(req.body));
      return res.status(200).json(presentTodo(updated));
    },

    remove: async (req: Request, res: Response) => {
      await deps.deleteTodo(parseTodoId(req.params.id));
      return res.sendStatus(204);
    },

    toggle: async (req: Request, res: Response) => {
      const toggled = await deps.toggleTodo(parseTodoId(req.params.id));
      return res.status(200).json(presentTodo(toggled));
    },

    stats: async (_req: Request, res: Response) => {
      const stats = await deps.getTodoStats();
      return res.status(200).json(presentStats(stats));
    },
  };
}

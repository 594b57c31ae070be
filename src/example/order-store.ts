import { v4 as uuidv4 } from "uuid";

export interface Order {
  readonly id: string;
  readonly item: string;
  readonly quantity: number;
  readonly email: string;
  readonly createdAt: string;
}

export type NewOrder = Omit<Order, "id" | "createdAt">;

export interface OrderStore {
  list(page: number, limit: number, sort: "asc" | "desc"): readonly Order[];
  find(id: string): Order | undefined;
  place(order: NewOrder): Order;
  remove(id: string): boolean;
}

/** Orders kept in insertion order, in memory. */
export const createInMemoryOrderStore = (
  now: () => Date = () => new Date(),
  nextId: () => string = uuidv4,
): OrderStore => {
  const orders = new Map<string, Order>();

  return {
    list(page, limit, sort) {
      const all = [...orders.values()];
      if (sort === "desc") all.reverse();
      const start = (page - 1) * limit;
      return all.slice(start, start + limit);
    },

    find: (id) => orders.get(id),

    place(order) {
      const placed: Order = { ...order, id: nextId(), createdAt: now().toISOString() };
      orders.set(placed.id, placed);
      return placed;
    },

    remove: (id) => orders.delete(id),
  };
};

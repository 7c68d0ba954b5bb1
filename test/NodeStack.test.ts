import { describe, test, expect } from "vitest";

import { NodeArena, createNode } from "../src/Ast";
import { NodeStack, StackUnderflowError } from "../src/NodeStack";

function items(count: number) {
  const arena = new NodeArena();
  return Array.from({ length: count }, () => createNode(arena, "Item", []));
}

describe("NodeStack", () => {
  test("push, peek and pop are LIFO", () => {
    const [a, b] = items(2);
    const stack = new NodeStack();
    expect(stack.isEmpty()).toBe(true);
    expect(stack.peek()).toBeUndefined();
    stack.push(a);
    stack.push(b);
    expect(stack.size).toBe(2);
    expect(stack.peek()).toBe(b);
    expect(stack.pop()).toBe(b);
    expect(stack.pop()).toBe(a);
    expect(stack.isEmpty()).toBe(true);
  });

  test("pop on an empty stack throws", () => {
    expect(() => new NodeStack().pop()).toThrow(StackUnderflowError);
  });

  test("popLastAsArray returns the popped run in push order", () => {
    const [container, x, y, z] = items(4);
    const stack = new NodeStack();
    for (const node of [container, x, y, z]) stack.push(node);
    stack.pop();
    stack.pop();
    stack.pop();
    expect(stack.pending).toBe(3);
    expect(stack.popLastAsArray(3)).toEqual([x, y, z]);
    expect(stack.pending).toBe(0);
    expect(stack.peek()).toBe(container);
  });

  test("popLastAsArray of zero nodes is an empty array", () => {
    const stack = new NodeStack();
    expect(stack.popLastAsArray(0)).toEqual([]);
  });

  test("popLastAsArray cannot reach past the history", () => {
    const [a] = items(1);
    const stack = new NodeStack();
    stack.push(a);
    stack.pop();
    expect(() => stack.popLastAsArray(2)).toThrow(RangeError);
  });

  test("pushing a popped node back removes it from the history", () => {
    const [a, b] = items(2);
    const stack = new NodeStack();
    stack.push(a);
    stack.push(b);
    stack.pop();
    stack.pop();
    stack.push(a);
    expect(stack.pending).toBe(1);
    expect(stack.claim(b)).toBe(true);
    expect(stack.claim(b)).toBe(false);
    expect(stack.pending).toBe(0);
  });

  test("drain hands over live and popped nodes", () => {
    const [a, b, c] = items(3);
    const stack = new NodeStack();
    stack.push(a);
    stack.push(b);
    stack.push(c);
    stack.pop();
    expect(stack.drain()).toEqual([a, b, c]);
    expect(stack.isEmpty()).toBe(true);
    expect(stack.pending).toBe(0);
  });
});

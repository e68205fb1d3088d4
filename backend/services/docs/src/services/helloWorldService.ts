// backend/services/docs/src/services/helloWorldService.ts

export const HELLO_MESSAGE = "Hello from repodocs!";

export function sayHelloWorld(): { message: string } {
  return { message: HELLO_MESSAGE };
}

export function main(): void {
  console.log("Here is the response:", sayHelloWorld());
}

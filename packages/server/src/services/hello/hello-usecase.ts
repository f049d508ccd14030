export class HelloUsecase {
  async getHello(name: string): Promise<string> {
    return `Hello, ${name}!`;
  }
}

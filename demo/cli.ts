import { main } from "./main.ts";

main(console.debug);

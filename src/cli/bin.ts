import { run } from "./index";

await run();

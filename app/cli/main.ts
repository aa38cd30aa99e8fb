import { runProductCLI } from "./productCLI";

runProductCLI(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error("Unexpected CLI failure:", error);
    process.exitCode = 1;
  });

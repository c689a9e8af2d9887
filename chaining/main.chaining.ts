import { ContractError } from "../shared/utils"
import { defaultWordsFile, DemoOptions, parseDemoArgs, readWords, runDemo } from "./src/demo"

const defaults: DemoOptions = {
    capacity: 53,
    strategy: "djb2",
}

try {
    const options = parseDemoArgs(process.argv.slice(2), defaults)
    runDemo(readWords(process.argv[4] ?? defaultWordsFile), options)
} catch (e) {
    if (e instanceof ContractError) {
        console.error(e.message)
        process.exitCode = 2
    } else {
        throw e
    }
}

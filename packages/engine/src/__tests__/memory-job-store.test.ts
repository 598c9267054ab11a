import { MemorySyncJobStore } from "../memory-job-store";
import { describeJobStoreContract } from "./store-contract";

describeJobStoreContract("MemorySyncJobStore", () => new MemorySyncJobStore());

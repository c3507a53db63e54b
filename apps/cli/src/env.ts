import dotenv from "dotenv";
dotenv.config({ quiet: true });

import "reflect-metadata";
import { DataSource } from "typeorm";
import { Shipment } from "../entities/Shipment";
import { Bid } from "../entities/Bid";
import { Match } from "../entities/Match";
import { AuctionWindow } from "../entities/AuctionWindow";
import { DriverProfile } from "../entities/DriverProfile";
import { ShipmentEvent } from "../entities/ShipmentEvent";
import { ReputationEvent } from "../entities/ReputationEvent";
import * as dotenv from "dotenv";

dotenv.config();

const { DB_HOST, DB_PORT, DB_USER, DB_PASSWORD, DB_NAME } = process.env;

export const marketplaceEntities = [
  Shipment,
  Bid,
  Match,
  AuctionWindow,
  DriverProfile,
  ShipmentEvent,
  ReputationEvent,
];

export const AppDataSource = new DataSource({
  type: "postgres",
  host: DB_HOST || "localhost",
  port: parseInt(DB_PORT || "5432"),
  username: DB_USER || "postgres",
  password: DB_PASSWORD || "",
  database: DB_NAME || "haulbid_db",
  synchronize: false,
  logging: process.env.NODE_ENV === "development",
  entities: marketplaceEntities,
  migrations: [__dirname + "/../migrations/*.ts"],
  subscribers: [],
});

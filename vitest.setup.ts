import 'reflect-metadata'
import { configureLogging } from './src/util/logger'

configureLogging({ level: 'silent' })

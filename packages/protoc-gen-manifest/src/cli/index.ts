import { runMain } from 'citty'
import { main } from './main'

void runMain(main)

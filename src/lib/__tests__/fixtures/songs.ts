import type { SongRecord } from "../../song-types"

export const librarySongs: readonly SongRecord[] = [
  {
    id: "s1",
    number: 512,
    title: "God Is Good",
    lyrics: "1. God is good all the time",
  },
  {
    id: "s2",
    number: 100,
    title: "Amazing Grace",
    lyrics: "1. Amazing grace how sweet the sound\nThat saved a wretch like me",
  },
  {
    id: "s3",
    number: 200,
    title: "Holy Holy Holy",
    lyrics: "1. Holy holy holy Lord God almighty",
  },
  {
    id: "a1",
    number: null,
    title: "Blessed Assurance",
    lyrics: "1. Blessed assurance Jesus is mine",
  },
  {
    id: "a2",
    number: null,
    title: "Blessed Assurances",
    lyrics: "1. Perfect submission all is at rest",
  },
  {
    id: "x1",
    number: 300,
    title: "Come Thou Fount",
    lyrics: "1. Come thou fount of every blessing",
  },
  {
    id: "x2",
    number: 300,
    title: "Come Thou Almighty King",
    lyrics: "1. Come thou almighty King help us thy name to sing",
  },
  {
    id: "e1",
    number: 7,
    title: "Silent Song",
    lyrics: "# lyrics still to be typed in",
  },
]
